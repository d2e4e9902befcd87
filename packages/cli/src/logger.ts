/**
 * Debug logger for the flask-kickstart CLI
 * Writes debug output to ~/.flask-kickstart/debug.log unless configured otherwise
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const LOG_DIR = '.flask-kickstart';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD';

export interface LoggerOptions {
  /** Log file path, or null to disable file logging */
  logFile: string | null;
}

let logFilePath: string | null | undefined;
let sessionStarted = false;

export function getDefaultLogPath(): string {
  return path.join(homedir(), LOG_DIR, DEBUG_LOG_FILE);
}

/**
 * Point the logger at a file (or disable it). Starts a new session.
 */
export function configureLogger(options: LoggerOptions): void {
  logFilePath = options.logFile;
  sessionStarted = false;
}

/**
 * Current log file path, or null when logging is disabled
 */
export function getLogPath(): string | null {
  if (logFilePath === undefined) {
    logFilePath = getDefaultLogPath();
  }
  return logFilePath;
}

/**
 * Initialize logging session with separator
 */
function initSession(logPath: string): void {
  if (sessionStarted) return;
  sessionStarted = true;

  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });

    // Rotate log if too large
    if (fs.existsSync(logPath) && fs.statSync(logPath).size > MAX_LOG_SIZE) {
      const backupPath = logPath + '.old';
      fs.rmSync(backupPath, { force: true });
      fs.renameSync(logPath, backupPath);
    }

    const timestamp = new Date().toISOString();
    const separator = '='.repeat(80);
    fs.appendFileSync(
      logPath,
      `\n${separator}\n[${timestamp}] flask-kickstart session started\n${separator}\n`
    );
  } catch {
    // Logging never interrupts the CLI
  }
}

/**
 * Format a log entry
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown, timestamp: Date = new Date()): string {
  let entry = `[${timestamp.toISOString()}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  const logPath = getLogPath();
  if (logPath === null) return;

  initSession(logPath);
  try {
    fs.appendFileSync(logPath, formatEntry(level, message, data));
  } catch {
    // Silently fail - don't interrupt CLI operation
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
    if ('code' in error) {
      errorData.errorCode = error.code;
    }
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger {
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
  debug: (message: string, data?: unknown) => void;
  command: (cmd: string, args?: Record<string, unknown>) => void;
}

/**
 * Create a logger for a specific command
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
    command: (cmd, args) => logCommand(`[${commandName}] ${cmd}`, args),
  };
}
