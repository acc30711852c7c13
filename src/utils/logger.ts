import chalk from 'chalk';
import type { LogEntry, ProgressMarker } from '../types/execution';

export class Logger {
  static info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  }

  static success(message: string): void {
    console.log(chalk.green('✓'), message);
  }

  static warning(message: string): void {
    console.log(chalk.yellow('⚠'), message);
  }

  static error(message: string): void {
    console.error(chalk.red('✗'), message);
  }

  static debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(chalk.gray('🔍'), message);
    }
  }

  /**
   * Echo one captured line of tool output
   */
  static output(entry: LogEntry): void {
    if (entry.stream === 'stderr') {
      console.log(chalk.yellow(entry.text));
    } else {
      console.log(entry.text);
    }
  }

  static progress(message: string): void {
    process.stdout.write(chalk.cyan('»') + ' ' + message + '\r');
  }

  static clearProgress(): void {
    process.stdout.write(' '.repeat(process.stdout.columns ?? 80) + '\r');
  }

  static progressBar(fraction: number, marker?: ProgressMarker, width = 30): string {
    const filled = Math.round(fraction * width);
    const bar = chalk.green('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled));
    const percent = `${(fraction * 100).toFixed(1)}%`.padStart(6);
    const step = marker ? chalk.gray(` [${marker.current}/${marker.total}]`) : '';
    return `${bar} ${percent}${step}`;
  }

  static divider(): void {
    console.log(chalk.gray('─'.repeat(80)));
  }

  static title(title: string): void {
    console.log('\n' + chalk.bold.cyan(title));
    console.log(chalk.cyan('═'.repeat(title.length)));
  }

  static subTitle(subTitle: string): void {
    console.log('\n' + chalk.bold(subTitle));
    console.log(chalk.gray('─'.repeat(subTitle.length)));
  }
}
