import { LOG_LEVEL } from "./config";

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type Level = keyof typeof LEVELS;

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function ts(): string {
  return new Date().toISOString();
}

function serialize(data: unknown): string {
  if (data instanceof Error) return JSON.stringify({ error: data.message });
  return JSON.stringify(data);
}

export function formatLine(level: Level, module: string, msg: string, data?: unknown, at: string = ts()): string {
  const base = `[${at}] [${level.toUpperCase()}] [${module}] ${msg}`;
  return data !== undefined ? `${base} ${serialize(data)}` : base;
}

export function createLogger(module: string, level: string = LOG_LEVEL): Logger {
  const currentLevel = isLevel(level) ? LEVELS[level] : LEVELS.info;

  return {
    debug: (msg, data) => {
      if (currentLevel <= LEVELS.debug) console.log(formatLine("debug", module, msg, data));
    },
    info: (msg, data) => {
      if (currentLevel <= LEVELS.info) console.log(formatLine("info", module, msg, data));
    },
    warn: (msg, data) => {
      if (currentLevel <= LEVELS.warn) console.warn(formatLine("warn", module, msg, data));
    },
    error: (msg, data) => {
      if (currentLevel <= LEVELS.error) console.error(formatLine("error", module, msg, data));
    },
  };
}
