import chalk from 'chalk';
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from '../constants';
import type { LogLevel } from '../types';
import { ConfigError } from './errors';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  CRITICAL: 50
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(value: string): LogLevel {
  const upper = value.trim().toUpperCase();
  // WARNING is accepted as an alias
  const level = upper === 'WARNING' ? 'WARN' : upper;
  if (!isLogLevel(level)) {
    throw new ConfigError(`Unknown log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export type LogSink = (line: string) => void;

/**
 * Leveled console logger. Everything goes to stderr so stdout only ever
 * carries command output.
 */
export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = DEFAULT_LOG_LEVEL, sink: LogSink = (line) => console.error(line)) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string): void {
    this.write('DEBUG', chalk.gray(`🔍 ${message}`));
  }

  info(message: string): void {
    this.write('INFO', chalk.blue(`📋 ${message}`));
  }

  warn(message: string): void {
    this.write('WARN', chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    this.write('ERROR', chalk.red(`❌ ${message}`));
  }

  critical(message: string): void {
    this.write('CRITICAL', chalk.bgRed.white(`🛑 ${message}`));
  }

  private write(level: LogLevel, line: string): void {
    if (this.isEnabled(level)) {
      this.sink(line);
    }
  }
}

export const logger = new Logger();
