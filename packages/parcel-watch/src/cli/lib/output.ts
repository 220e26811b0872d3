/**
 * Output Formatting for CLI Commands
 *
 * Commands write through a CommandOutput so they can be run against a
 * buffer in tests.
 *
 * @module cli/lib/output
 */

/**
 * Line sink for command output
 */
export interface CommandOutput {
  /** Regular output (stdout) */
  log(line: string): void;
  /** Diagnostics (stderr) */
  error(line: string): void;
}

export const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly value: (row: T) => string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a plain-text table
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map((row) => (row[i] ?? '').length))
  );

  const pad = (value: string, i: number): string => {
    const width = widths[i] ?? value.length;
    return columns[i]?.align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((col, i) => pad(col.header, i)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = cells.map((row) => row.map((cell, i) => pad(cell, i)).join(' | '));

  return [headerRow, separator, ...dataRows].map((line) => line.trimEnd()).join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Print error (JSON object in --json mode)
 */
export function printError(out: CommandOutput, message: string, json: boolean): void {
  if (json) {
    out.log(formatJson({ error: message }));
  } else {
    out.error(`Error: ${message}`);
  }
}
