import fs from 'fs';
import path from 'path';
import util from 'util';
import type { LoggingConfig } from './configLoader';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

let consoleLevel: LogLevel = LogLevel.INFO;
let fileLevel: LogLevel = LogLevel.INFO;
let logFilePath: string | null = null;
let quietConsole = false;

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Console-only setup from `LOG_LEVEL`, used until the configuration is loaded.
 */
export function bootstrapLogger(): void {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    consoleLevel = envLevel;
  }
}

function prepareLogFile(file: string): string | null {
  const resolved = path.resolve(process.cwd(), file);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    return resolved;
  } catch (err) {
    console.error(`[${new Date().toLocaleString()}] [ERROR] Cannot create log directory for ${resolved}, file logging disabled: ${util.format(err)}`);
    return null;
  }
}

export function applyLoggerConfig(config: LoggingConfig): void {
  consoleLevel = config.consoleLogLevel;
  fileLevel = config.fileLogLevel;
  quietConsole = config.consoleQuietMode;
  logFilePath = config.logFile ? prepareLogFile(config.logFile) : null;

  log(LogLevel.DEBUG, `Logger configured: console ${consoleLevel}, file ${logFilePath ? `${fileLevel} -> ${logFilePath}` : 'off'}`);
}

function writeConsole(level: LogLevel, line: string): void {
  // Quiet mode keeps the console to warnings and errors
  if (quietConsole && levelOrder[level] < levelOrder[LogLevel.WARN]) return;

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
      console.error(line);
      break;
  }
}

function writeFile(file: string, line: string): void {
  try {
    fs.appendFileSync(file, line + '\n', { encoding: 'utf8' });
  } catch (err) {
    // Not through log(), which would write to the same file again
    console.error(`[${new Date().toLocaleString()}] [ERROR] Cannot write log file ${file}: ${util.format(err)}`);
  }
}

/**
 * Logs to the console and, when configured, to the log file. `args` are
 * formatted into the message like console.log does.
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const line = `[${new Date().toLocaleString()}] [${level}] ${util.format(message, ...args)}`;

  if (levelOrder[level] >= levelOrder[consoleLevel]) {
    writeConsole(level, line);
  }
  if (logFilePath && levelOrder[level] >= levelOrder[fileLevel]) {
    writeFile(logFilePath, line);
  }
}
