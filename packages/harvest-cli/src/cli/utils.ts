// Simple CLI utilities for textharvest
const wrap = (open: string) => (text: string) => (process.env.NO_COLOR ? text : `\x1b[${open}m${text}\x1b[0m`);

export const colors = {
  red: wrap('31'),
  green: wrap('32'),
  yellow: wrap('33'),
  cyan: wrap('36'),
  gray: wrap('90'),
};

export const safeSymbols = {
  check: '✓',
  arrow: '→',
  bullet: '•',
  warning: '⚠',
};

export class TimingTracker {
  private startTime: number;

  constructor() {
    this.startTime = Date.now();
  }

  getElapsed(): number {
    return Date.now() - this.startTime;
  }
}

export function formatTiming(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function box(title: string, lines: string[] = []): string {
  const rows = [title, ...lines, ''];
  return rows
    .map(line => (line.length > 0 ? `│ ${line}` : '│'))
    .join('\n');
}

export function keyValue(entries: Record<string, string | number>): string[];
export function keyValue(key: string, value: string | number): string;
export function keyValue(
  arg1: string | Record<string, string | number>,
  arg2: string | number = ''
): string | string[] {
  const format = (key: string, value: string | number) => `${colors.cyan(key)}: ${value}`;

  if (typeof arg1 === 'string') {
    return format(arg1, arg2);
  }

  return Object.entries(arg1).map(([key, value]) => format(key, value));
}
