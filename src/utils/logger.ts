import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

type ExtraInformation = Record<string, unknown>;

interface LogEntry {
  fileName: string;
  functionName: string;
  userId?: string;
  level: LogLevel;
  message: string;
}

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;

  try {
    Error.prepareStackTrace = (_, stack) => stack;
    const stack: unknown = new Error().stack;

    if (Array.isArray(stack) && stack.length > depth) {
      const caller: NodeJS.CallSite = stack[depth];
      const fileName = caller.getFileName();
      const functionName = caller.getFunctionName();

      return {
        fileName: fileName ? path.basename(fileName, '.ts') : 'unknown',
        functionName: functionName || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(' | ');
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods

  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;

  if (args.length > 0) {
    const lastArg = args[args.length - 1];
    if (isExtraInformation(lastArg)) {
      extraInformation = lastArg;
      messageParts = args.slice(0, -1);
    }
  }

  // Join message parts like console.log does
  const message = messageParts.map(formatValue).join(' ');

  const logEntry: LogEntry = {
    fileName,
    functionName,
    level,
    message,
  };

  // userId is lifted out of extra information so request logs line up
  if (extraInformation && typeof extraInformation.userId === 'string') {
    const { userId, ...rest } = extraInformation;
    logEntry.userId = userId;
    extraInformation = Object.keys(rest).length > 0 ? rest : undefined;
  }

  const parts: string[] = [];

  parts.push(`${logEntry.level}`);

  parts.push(`${logEntry.fileName}:${logEntry.functionName}`);

  if (logEntry.userId) {
    parts.push(`user ${logEntry.userId}`);
  }

  parts.push(logEntry.message);

  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }

  const fullOutput = parts.join(' | ');

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.LOG:
      console.log(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
    default:
      console.log(fullOutput);
  }
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Generating calendar for', month, { userId: 'u1' })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Logged progress for', month, { saved: 120.5 })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Unknown region', region, { fallback: 'US-CA' })
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Request failed', path, { error })
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}

/**
 * Generic logging function that accepts a level and multiple message parts like console.log
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
export function logger(level: LogLevel, ...args: unknown[]): void {
  logMessage(level, ...args);
}
