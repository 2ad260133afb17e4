/**
 * Shared CLI output formatting utilities
 */

import chalk from 'chalk';

export function info(msg: string): void {
  console.log(chalk.blue(`ℹ ${msg}`));
}

export function error(msg: string): void {
  console.error(chalk.red(`✗ ${msg}`));
}

/**
 * Lay out a table as lines: header, rule, then one line per row.
 * Columns are as wide as their widest cell; trailing blanks are trimmed.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, i) =>
    Math.max(...allRows.map((row) => (row[i] ?? '').length))
  );

  const layout = (row: string[]) =>
    colWidths.map((w, i) => (row[i] ?? '').padEnd(w)).join('  ').trimEnd();

  return [
    layout(headers),
    colWidths.map((w) => '─'.repeat(w)).join('──'),
    ...rows.map(layout),
  ];
}

/**
 * Print a simple padded table to stdout
 */
export function printTable(headers: string[], rows: string[][]): void {
  const [headerLine, rule, ...lines] = formatTable(headers, rows);
  console.log(chalk.bold(headerLine));
  console.log(rule);
  for (const line of lines) {
    console.log(line);
  }
}
