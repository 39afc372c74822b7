type Level = "debug" | "info" | "warn" | "error";

import { LOG_LEVEL } from "../config";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, extra?: LogFields): void;
  info(msg: string, extra?: LogFields): void;
  warn(msg: string, extra?: LogFields): void;
  error(msg: string, extra?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLevel(v: string): Level {
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return "info";
}

const threshold = parseLevel(LOG_LEVEL);

// JSON.stringify turns an Error into {}.
function serialize(extra: LogFields): LogFields {
  const out: LogFields = {};
  for (const [k, v] of Object.entries(extra)) {
    out[k] = v instanceof Error ? { name: v.name, message: v.message } : v;
  }
  return out;
}

function log(level: Level, msg: string, bindings: LogFields, extra?: LogFields) {
  if (levelOrder[level] < levelOrder[threshold]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    msg,
    ...bindings,
    ...(extra ? serialize(extra) : {}),
  };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload));
}

function createLogger(bindings: LogFields): Logger {
  return {
    debug: (msg, extra) => log("debug", msg, bindings, extra),
    info: (msg, extra) => log("info", msg, bindings, extra),
    warn: (msg, extra) => log("warn", msg, bindings, extra),
    error: (msg, extra) => log("error", msg, bindings, extra),
    child: (more) => createLogger({ ...bindings, ...serialize(more) }),
  };
}

export const logger = createLogger({});
