import { DEFAULT_DIFFICULTY, DEFAULT_QUERY_TYPE, isDifficulty } from "./queries/templates";
import type { QueryRequest } from "./types";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Lenient by contract: bad or missing fields fall back to defaults, nothing is rejected.
// query_type is kept as sent; template selection resolves unknown tags.
export function parseQueryRequest(body: unknown): QueryRequest {
  const b = isRecord(body) ? body : {};
  return {
    query_type: typeof b.query_type === "string" ? b.query_type : DEFAULT_QUERY_TYPE,
    topic: typeof b.topic === "string" ? b.topic : "",
    difficulty: isDifficulty(b.difficulty) ? b.difficulty : DEFAULT_DIFFICULTY,
  };
}
