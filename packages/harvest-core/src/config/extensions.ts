/**
 * Extension allow-list helpers
 */

import { EXTENSION_PRESETS, FALLBACK_EXTENSIONS, type ExtensionPreset } from '../defaults';

/**
 * Lowercase an extension and make sure it starts with a dot.
 * Returns an empty string for blank input.
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) {
    return '';
  }
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Normalize every entry, dropping blanks and repeats (first one wins)
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const extension of extensions) {
    const normalized = normalizeExtension(extension);
    if (normalized) {
      seen.add(normalized);
    }
  }
  return Array.from(seen);
}

/**
 * Parse a comma-separated list such as `py, .CPP,js`.
 * Falls back to `.csv,.erb,.erh` when nothing usable is given.
 */
export function parseExtensionList(input: string): string[] {
  const extensions = normalizeExtensions(input.split(','));
  return extensions.length > 0 ? extensions : [...FALLBACK_EXTENSIONS];
}

export function isExtensionPreset(name: string): name is ExtensionPreset {
  return Object.prototype.hasOwnProperty.call(EXTENSION_PRESETS, name);
}

export function getExtensionPreset(preset: ExtensionPreset): string[] {
  return [...EXTENSION_PRESETS[preset]];
}
