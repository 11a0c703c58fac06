import { type LevelWithSilent, type Logger, pino } from 'pino';
import { z } from 'zod';

import { safelyAccessEnvVar } from './env.js';

// A custom enum definition because pino does not export an enum
// and because we use 'off' instead of 'silent'
export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Off = 'off',
}

function isPinoLevel(level: string): level is LevelWithSilent {
  return level === 'silent' || level in pino.levels.values;
}

export function toPinoLevel(level?: string): LevelWithSilent | undefined {
  if (level && isPinoLevel(level)) return level;
  // Accept the agent-style spellings for disabling logs
  else if (level === 'none' || level === 'off') return 'silent';
  else return undefined;
}

let logLevel: LevelWithSilent =
  toPinoLevel(safelyAccessEnvVar('LOG_LEVEL', true)) || 'info';

export function getLogLevel() {
  return logLevel;
}

export enum LogFormat {
  Pretty = 'pretty',
  JSON = 'json',
}

const envLogFormat = z
  .nativeEnum(LogFormat)
  .safeParse(safelyAccessEnvVar('LOG_FORMAT', true));
let logFormat: LogFormat = envLogFormat.success
  ? envLogFormat.data
  : LogFormat.JSON;

export function getLogFormat() {
  return logFormat;
}

// Note, for brevity and convenience, the rootLogger is exported directly
export let rootLogger = createIchainPinoLogger(logLevel, logFormat);

export function getRootLogger() {
  return rootLogger;
}

export function configureRootLogger(
  newLogFormat: LogFormat,
  newLogLevel: LogLevel,
) {
  logFormat = newLogFormat;
  logLevel = toPinoLevel(newLogLevel) || logLevel;
  rootLogger = createIchainPinoLogger(logLevel, logFormat);
  return rootLogger;
}

export function setRootLogger(logger: Logger) {
  rootLogger = logger;
  return rootLogger;
}

export function createIchainPinoLogger(
  logLevel: LevelWithSilent,
  logFormat: LogFormat,
) {
  return pino({
    level: logLevel,
    name: 'ichain',
    formatters: {
      // Remove pino's default bindings of hostname but keep pid
      bindings: (defaultBindings) => ({ pid: defaultBindings.pid }),
    },
    hooks: {
      logMethod(inputArgs, method, level) {
        // pino-pretty is not meant for production, so the pretty format
        // bypasses pino and writes straight to the console
        if (
          logFormat === LogFormat.Pretty &&
          level >= pino.levels.values[logLevel]
        ) {
          // eslint-disable-next-line no-console
          console.log(...inputArgs);
          // Then return null to prevent pino from logging
          return null;
        }
        return method.apply(this, inputArgs);
      },
    },
  });
}
