/**
 * Colored console logger with per-attempt sinks
 */
import { AsyncLocalStorage } from 'async_hooks';
import type { AttemptState, MappingSource } from '../types/index.js';

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Background
  bgBlue: '\x1b[44m',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Each print category maps onto a threshold level
const CATEGORY_LEVEL: Record<string, LogLevel> = {
  debug: 'debug',
  info: 'info',
  success: 'info',
  action: 'info',
  state: 'debug',
  mapping: 'info',
  attempt: 'info',
  divider: 'info',
  summary: 'info',
  banner: 'info',
  warn: 'warn',
  error: 'error',
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

function formatMessage(prefix: string, color: string, message: string): string {
  return `${colors.dim}[${timestamp()}]${colors.reset} ${color}${prefix}${colors.reset} ${message}`;
}

export type LogEntry = { level: string; message: string; timestamp: string };
export type LogSink = (entry: LogEntry) => void;

const logSinks = new Map<string, Set<LogSink>>();
const logContext = new AsyncLocalStorage<{ attemptId: string }>();

export function stripAnsi(input: string): string {
  return input.replace(/\x1b\[[0-9;]*m/g, '');
}

function emit(level: string, formatted: string): void {
  const context = logContext.getStore();
  if (!context) return;
  const sinks = logSinks.get(context.attemptId);
  if (!sinks || sinks.size === 0) return;
  const ts = timestamp();
  const lines = stripAnsi(formatted).split('\n');
  for (const line of lines) {
    const trimmed = line.trimEnd();
    if (trimmed.length === 0) continue;
    for (const sink of sinks) {
      sink({ level, message: trimmed, timestamp: ts });
    }
  }
}

function print(category: string, formatted: string): void {
  // Sinks receive everything; the console honours the level
  emit(category, formatted);
  const threshold = CATEGORY_LEVEL[category] ?? 'info';
  if (LEVEL_ORDER[threshold] < LEVEL_ORDER[currentLevel]) return;
  console.log(formatted);
}

const STATE_COLORS: Partial<Record<AttemptState, string>> = {
  RETRYING: colors.yellow,
  DONE: colors.green,
  FAILED: colors.red,
};

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  addLogSink(attemptId: string, sink: LogSink): void {
    const sinks = logSinks.get(attemptId) ?? new Set<LogSink>();
    sinks.add(sink);
    logSinks.set(attemptId, sinks);
  },

  // Without a sink, drops every sink registered for the attempt
  removeLogSink(attemptId: string, sink?: LogSink): void {
    const sinks = logSinks.get(attemptId);
    if (!sinks) return;
    if (sink) sinks.delete(sink);
    if (!sink || sinks.size === 0) logSinks.delete(attemptId);
  },

  withAttemptContext<T>(attemptId: string, fn: () => T): T {
    return logContext.run({ attemptId }, fn);
  },

  info(message: string): void {
    print('info', formatMessage('INFO', colors.blue, message));
  },

  success(message: string): void {
    print('success', formatMessage('SUCCESS', colors.green, message));
  },

  warn(message: string): void {
    print('warn', formatMessage('WARN', colors.yellow, message));
  },

  error(message: string): void {
    print('error', formatMessage('ERROR', colors.red, message));
  },

  debug(message: string): void {
    print('debug', formatMessage('DEBUG', colors.dim, message));
  },

  // Browser actions
  action(message: string): void {
    print('action', formatMessage('BOT', colors.cyan + colors.bright, message));
  },

  // State machine transitions
  state(from: AttemptState, to: AttemptState): void {
    const color = STATE_COLORS[to] ?? colors.magenta;
    print('state', formatMessage('STATE', color, `${from} → ${to}`));
  },

  mapping(label: string, attribute: string, confidence: number, source: MappingSource): void {
    const confidenceColor = confidence >= 0.8 ? colors.green : confidence >= 0.6 ? colors.yellow : colors.red;
    print(
      'mapping',
      formatMessage(
        'MAP',
        colors.magenta,
        `"${label}" → ${colors.bright}${attribute}${colors.reset} ` +
          `${confidenceColor}${confidence.toFixed(2)}${colors.reset} ${colors.dim}(${source})${colors.reset}`
      )
    );
  },

  attempt(jobUrl: string, status: 'applying' | 'success' | 'failed' | 'cancelled'): void {
    const statusColors: Record<string, string> = {
      applying: colors.yellow,
      success: colors.green,
      failed: colors.red,
      cancelled: colors.dim,
    };
    const statusText = status.toUpperCase().padEnd(9);
    print('attempt', formatMessage('APPLY', statusColors[status], `${statusText} ${jobUrl}`));
  },

  divider(title?: string): void {
    const line = '─'.repeat(50);
    if (title) {
      print('divider', `\n${colors.dim}${line}${colors.reset}`);
      print('divider', `${colors.bright}${colors.cyan}  ${title}${colors.reset}`);
      print('divider', `${colors.dim}${line}${colors.reset}\n`);
    } else {
      print('divider', `${colors.dim}${line}${colors.reset}`);
    }
  },

  summary(stats: { attempted: number; applied: number; failed: number; retries: number }): void {
    print('summary', `\n${colors.bgBlue}${colors.white}${colors.bright} SUMMARY ${colors.reset}`);
    print('summary', `${colors.cyan}  Job URLs attempted:${colors.reset}   ${stats.attempted}`);
    print('summary', `${colors.green}  Applications sent:${colors.reset}    ${stats.applied}`);
    if (stats.failed > 0) {
      print('summary', `${colors.red}  Failed attempts:${colors.reset}      ${stats.failed}`);
    }
    print('summary', `${colors.cyan}  Retries used:${colors.reset}         ${stats.retries}`);
    print('summary', '');
  },

  banner(): void {
    print(
      'banner',
      `
${colors.cyan}${colors.bright}
   ╔═══════════════════════════════════════════╗
   ║          Job Application Agent            ║
   ║     AI field mapping • Learns portals     ║
   ╚═══════════════════════════════════════════╝
${colors.reset}`
    );
  },
};
