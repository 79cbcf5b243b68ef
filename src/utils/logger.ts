import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from '../types/config.js';

// ANSI color codes for modern terminals (Ghostty, iTerm2, etc.)
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',

  // Bright foreground
  brightBlack: '\x1b[90m',
  brightCyan: '\x1b[96m',
};

// Helper to style text
const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,

  green: (text: string) => `${colors.green}${text}${colors.reset}`,
  red: (text: string) => `${colors.red}${text}${colors.reset}`,
  yellow: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  cyan: (text: string) => `${colors.cyan}${text}${colors.reset}`,
  magenta: (text: string) => `${colors.magenta}${text}${colors.reset}`,

  brightBlack: (text: string) => `${colors.brightBlack}${text}${colors.reset}`,
  brightCyan: (text: string) => `${colors.brightCyan}${text}${colors.reset}`,

  // Combined styles
  successIcon: () => `${colors.green}✓${colors.reset}`,
  errorIcon: () => `${colors.red}✗${colors.reset}`,
  warnIcon: () => `${colors.yellow}⚠${colors.reset}`,
  stepIcon: () => `${colors.blue}→${colors.reset}`,
};

interface LoggerSettings {
  level: LogLevel;
  file?: string;
}

const settings: LoggerSettings = {
  level: 'info',
};

/**
 * Set the minimum level and, optionally, a file that receives a plain-text
 * copy of every line. The file's directory is created if missing.
 */
export function configureLogger(options: Partial<LoggerSettings>): void {
  if (options.level) {
    settings.level = options.level;
  }
  if (options.file !== undefined) {
    const dir = dirname(options.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    settings.file = options.file;
  }
}

export function resetLogger(): void {
  settings.level = 'info';
  settings.file = undefined;
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

function writeToFile(level: string, message: string): void {
  if (!settings.file) return;
  const plain = message.replace(ANSI_PATTERN, '');
  appendFileSync(settings.file, `${new Date().toISOString()} - ${level} - ${plain}\n`, 'utf-8');
}

export const logger = {
  success(message: string): void {
    console.log(`${style.successIcon()} ${style.green(message)}`);
    writeToFile('INFO', message);
  },

  error(message: string): void {
    console.error(`${style.errorIcon()} ${style.red(message)}`);
    writeToFile('ERROR', message);
  },

  warn(message: string): void {
    console.log(`${style.warnIcon()} ${style.yellow(message)}`);
    writeToFile('WARNING', message);
  },

  info(message: string): void {
    console.log(message);
    writeToFile('INFO', message);
  },

  debug(message: string): void {
    if (settings.level !== 'debug') return;
    console.log(style.brightBlack(message));
    writeToFile('DEBUG', message);
  },

  step(message: string): void {
    console.log(`${style.stepIcon()} ${message}`);
    writeToFile('INFO', message);
  },

  section(message: string): void {
    console.log(`\n${style.bold(message)}`);
    writeToFile('INFO', message);
  },

  blank(): void {
    console.log();
  },

  // Expose style helpers for custom formatting
  style,
  colors,

  box: {
    line: (width: number) => '─'.repeat(width),
  },
};
