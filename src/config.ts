import { env } from "process";

function intFromEnv(name: string, def: number): number {
  const v = env[name];
  if (!v) return def;
  const n = parseInt(v, 10);
  return Number.isFinite(n) && n >= 0 ? n : def;
}

function boolFromEnv(name: string, def: boolean): boolean {
  const v = env[name];
  if (!v) return def;
  return v === "1" || v.toLowerCase() === "true";
}

export const NEO4J_URI = env.NEO4J_URI || "";
export const NEO4J_USERNAME = env.NEO4J_USERNAME || "";
export const NEO4J_PASSWORD = env.NEO4J_PASSWORD || "";
export const NEO4J_DATABASE = env.NEO4J_DATABASE || undefined;
// Ping the server at startup; a failed ping drops to mock mode.
export const NEO4J_VERIFY = boolFromEnv("NEO4J_VERIFY", true);

export const PORT = intFromEnv("PORT", 8000);
export const LOG_LEVEL = (env.LOG_LEVEL || "info").toLowerCase();

// Pause after each streamed result row. Pacing only.
export const STREAM_DELAY_MS = intFromEnv("STREAM_DELAY_MS", 100);
export const REPORT_QUERY_ERRORS = boolFromEnv("REPORT_QUERY_ERRORS", false);
