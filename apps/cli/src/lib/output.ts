/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { Severity } from '@edit-assist/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printProgress(line: string): void {
  console.log(chalk.gray(line));
}

const severityColors: Record<Severity, (text: string) => string> = {
  ERROR: chalk.red,
  WARNING: chalk.yellow,
  INFO: chalk.gray,
};

/**
 * Print report text, colouring issue lines by their severity marker.
 */
export function printReport(report: string): void {
  for (const line of report.split('\n')) {
    if (line.startsWith('  [!]')) {
      console.log(severityColors.ERROR(line));
    } else if (line.startsWith('  [?]')) {
      console.log(severityColors.WARNING(line));
    } else if (line.startsWith('  [ ]')) {
      console.log(severityColors.INFO(line));
    } else {
      console.log(line);
    }
  }
}
