/**
 * Coded logger. Every message carries a short stable code so log lines can be
 * grepped across releases, e.g. logger.info('STORE001', 'Loaded 4 records').
 */

import { loadConfig, LOG_LEVELS } from '../constants';
import type { LogLevel } from '../types';

type Sink = (line: string) => void;

const SINKS: Record<Exclude<LogLevel, 'silent'>, Sink> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warning: (line) => console.warn(line),
  error: (line) => console.error(line),
};

let threshold: LogLevel = loadConfig().logLevel;

function emit(level: Exclude<LogLevel, 'silent'>, code: string, message: string) {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;
  SINKS[level](`[${level.toUpperCase()}] ${code}: ${message}`);
}

export const logger = {
  debug: (code: string, message: string) => emit('debug', code, message),
  info: (code: string, message: string) => emit('info', code, message),
  warning: (code: string, message: string) => emit('warning', code, message),
  error: (code: string, message: string) => emit('error', code, message),
};

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}
