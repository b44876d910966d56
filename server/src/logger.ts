import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export const Logger = {
  debug(message: string): void {
    if (enabled('debug')) console.log(chalk.gray(`· ${message}`));
  },
  info(message: string): void {
    if (enabled('info')) console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    if (enabled('info')) console.log(chalk.green(`✓ ${message}`));
  },
  warn(message: string): void {
    if (enabled('warn')) console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  fail(message: string): void {
    if (enabled('error')) console.error(chalk.red(`❌ ${message}`));
  },
} as const;
