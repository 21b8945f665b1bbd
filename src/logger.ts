/**
 * Logger utilities with ANSI colors
 */

import type { LanguageModelUsage } from 'ai';

export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

export type Color = keyof typeof colors;

let quiet = false;

/**
 * Suppress progress output. Errors (red) are still printed.
 */
export function setQuiet(value: boolean) {
  quiet = value;
}

export function log(message: string, color: Color = 'reset') {
  if (quiet && color !== 'red') return;
  console.log(`${colors[color]}${message}${colors.reset}`);
}

export function logSection(title: string) {
  if (quiet) return;
  console.log();
  log(`━━━ ${title} ━━━`, 'cyan');
}

/**
 * Print a block of text without coloring it, e.g. generated code or model output.
 */
export function logBlock(text: string) {
  if (quiet) return;
  console.log(text);
}

/**
 * Format a number with thousands separators.
 */
function formatNumber(n: number): string {
  return n.toLocaleString();
}

/**
 * Log a usage report showing token counts.
 */
export function logUsageReport(
  usage: LanguageModelUsage,
  model: string,
  label = 'Usage'
) {
  const inputTokens = usage.inputTokens ?? 0;
  const outputTokens = usage.outputTokens ?? 0;
  const totalTokens = usage.totalTokens ?? (inputTokens + outputTokens);

  log(`  ┌─ ${label} (${model}) ─────────────────────`, 'dim');
  log(`  │  Input tokens:  ${formatNumber(inputTokens)}`, 'dim');
  log(`  │  Output tokens: ${formatNumber(outputTokens)}`, 'dim');
  log(`  │  Total tokens:  ${formatNumber(totalTokens)}`, 'dim');
  log(`  └────────────────────────────────────────`, 'dim');
}
