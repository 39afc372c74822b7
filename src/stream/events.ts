import { setTimeout as sleep } from "node:timers/promises";
import type { ResultRow } from "../adapters/graph";

export type ProcessingEvent = { status: "processing"; query: string };
export type ResultEvent = { status: "result"; data: ResultRow; index: number };
export type ErrorEvent = { status: "error"; message: string };
export type CompleteEvent = { status: "complete"; total_results: number };

export type StreamEvent = ProcessingEvent | ResultEvent | ErrorEvent | CompleteEvent;

export type EmitOptions = {
  query?: string;
  delayMs?: number;
  // Set when the query failed and the caller asked to hear about it.
  error?: string;
  signal?: AbortSignal;
};

async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (ms <= 0) return !signal?.aborted;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}

/**
 * Yields processing, one result per row (in order), then complete.
 * Stops early, without a complete event, once `signal` aborts.
 */
export async function* emitEvents(results: readonly ResultRow[], opts: EmitOptions = {}): AsyncGenerator<StreamEvent> {
  const { query = "", delayMs = 0, error, signal } = opts;
  if (signal?.aborted) return;

  yield { status: "processing", query };

  for (let index = 0; index < results.length; index++) {
    yield { status: "result", data: results[index], index };
    if (!(await pause(delayMs, signal))) return;
  }

  if (error !== undefined) yield { status: "error", message: error };
  yield { status: "complete", total_results: results.length };
}

export function formatSse(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}
