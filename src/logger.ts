import { LOG_LEVEL } from "./config";

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
type Level = keyof typeof LEVELS;

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

const currentLevel = isLevel(LOG_LEVEL) ? LEVELS[LOG_LEVEL] : LEVELS.info;

function ts(): string {
  return new Date().toISOString();
}

// Errors stringify to "{}", so flatten them before JSON encoding
function serialize(data: unknown): string {
  if (data instanceof Error) return JSON.stringify({ error: data.message });
  return JSON.stringify(data);
}

function fmt(level: Level, module: string, msg: string, data?: unknown): string {
  const base = `[${ts()}] [${level.toUpperCase()}] [${module}] ${msg}`;
  return data !== undefined ? `${base} ${serialize(data)}` : base;
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  return {
    debug: (msg: string, data?: unknown) => {
      if (currentLevel <= LEVELS.debug) console.log(fmt("debug", module, msg, data));
    },
    info: (msg: string, data?: unknown) => {
      if (currentLevel <= LEVELS.info) console.log(fmt("info", module, msg, data));
    },
    warn: (msg: string, data?: unknown) => {
      if (currentLevel <= LEVELS.warn) console.warn(fmt("warn", module, msg, data));
    },
    error: (msg: string, data?: unknown) => {
      if (currentLevel <= LEVELS.error) console.error(fmt("error", module, msg, data));
    },
  };
}
