/**
 * Path utilities for textharvest
 */

import path from 'node:path';

/**
 * Case-folded extension including the leading dot, or '' when there is none.
 * Dotfiles such as `.gitignore` have no extension.
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}
