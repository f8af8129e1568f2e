import chalk from 'chalk';
import Table from 'cli-table3';

let jsonMode = false;

export function setJsonOutput(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonOutput(): boolean {
  return jsonMode;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  table.push(...rows);
  console.log(table.toString());
}

export function printSuccess(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'success', message: msg });
  } else {
    console.log(chalk.green('✓ ') + msg);
  }
}

export function printError(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'error', message: msg });
  } else {
    console.error(chalk.red('✗ ') + msg);
  }
}

export function printInfo(msg: string): void {
  if (!jsonMode) {
    console.log(chalk.blue('ℹ ') + msg);
  }
}

/** Short local time for table cells */
export function formatTime(iso: string | null | undefined): string {
  return iso ? iso.slice(11, 19) : '-';
}

export function yesNo(value: boolean, good: boolean = true): string {
  const ok = value === good;
  return ok ? chalk.green(value ? 'yes' : 'no') : chalk.red(value ? 'yes' : 'no');
}

/** Colour bar for a percentage, as in the pool view */
export function healthBar(pct: number, width = 12): string {
  const clamped = Math.max(0, Math.min(pct, 100));
  const filled = Math.round((clamped / 100) * width);
  const color = clamped >= 85 ? chalk.green : clamped >= 60 ? chalk.yellow : chalk.red;
  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled)) + ` ${clamped.toFixed(0)}%`;
}
