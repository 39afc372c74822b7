import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import { pathToFileURL } from "node:url";
import {
  PORT,
  NEO4J_URI,
  NEO4J_USERNAME,
  NEO4J_PASSWORD,
  NEO4J_DATABASE,
  NEO4J_VERIFY,
  STREAM_DELAY_MS,
  REPORT_QUERY_ERRORS,
} from "./config";
import { logger } from "./utils/logger";
import type { GraphAdapter } from "./adapters/graph";
import { connectGraph } from "./adapters/neo4j";
import { QueryExecutor } from "./queries/executor";
import { resolveQueryType, selectTemplate } from "./queries/templates";
import { emitEvents, formatSse } from "./stream/events";
import { getToolSchema } from "./tools/schema";
import { parseQueryRequest } from "./request";
import type { HealthResponse, ToolsResponse } from "./types";
import { errorHandler } from "./middleware/error";

export type AppOptions = {
  // Process-scoped connection; null runs the server in mock mode.
  graph: GraphAdapter | null;
  streamDelayMs?: number;
  reportQueryErrors?: boolean;
};

export function createApp(opts: AppOptions) {
  const { graph, streamDelayMs = STREAM_DELAY_MS, reportQueryErrors = REPORT_QUERY_ERRORS } = opts;
  const executor = new QueryExecutor(graph);

  const app = express();
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    const body: HealthResponse = {
      status: "healthy",
      message: "Afrikaans Agent MCP Server is running!",
      database_connected: executor.connected,
    };
    res.json(body);
  });

  app.get("/tools", (_req, res) => {
    const body: ToolsResponse = { tools: [getToolSchema()] };
    res.json(body);
  });

  app.post("/query", async (req, res, next) => {
    const started = Date.now();
    const log = logger.child({ requestId: randomUUID() });
    try {
      const { query_type, topic, difficulty } = parseQueryRequest(req.body);
      log.info("query_received", { queryType: query_type, topic, difficulty });

      const disconnected = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) disconnected.abort();
      });

      const cypher = selectTemplate(query_type);
      const outcome = await executor.run(cypher, { topic, difficulty }, query_type);
      if (disconnected.signal.aborted) {
        log.info("query_abandoned", {
          queryType: resolveQueryType(query_type),
          totalResults: outcome.rows.length,
          durationMs: Date.now() - started,
        });
        return;
      }

      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });

      let sent = 0;
      const events = emitEvents(outcome.rows, {
        query: topic,
        delayMs: streamDelayMs,
        error: !outcome.ok && reportQueryErrors ? outcome.error.message : undefined,
        signal: disconnected.signal,
      });
      for await (const event of events) {
        res.write(formatSse(event));
        sent++;
      }
      res.end();

      log.info("query_streamed", {
        queryType: resolveQueryType(query_type),
        totalResults: outcome.rows.length,
        events: sent,
        aborted: disconnected.signal.aborted,
        durationMs: Date.now() - started,
      });
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);
  return app;
}

export type StartOptions = AppOptions & { port: number };

export type Running = {
  server: Server;
  // Closes the HTTP server, then the graph connection. Safe to call repeatedly.
  stop: () => Promise<void>;
};

export async function start(opts: StartOptions): Promise<Running> {
  const { port, ...appOpts } = opts;
  const app = createApp(appOpts);
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(port, () => resolve(s));
  });
  const addr = server.address();
  logger.info("server_listening", {
    port: typeof addr === "object" && addr ? addr.port : port,
    databaseConnected: opts.graph !== null,
  });

  let stopped: Promise<void> | undefined;
  const stop = () => {
    if (!stopped) {
      stopped = new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }).then(async () => {
        await opts.graph?.close();
        logger.info("server_stopped");
      });
    }
    return stopped;
  };
  return { server, stop };
}

async function main() {
  const graph = await connectGraph({
    uri: NEO4J_URI,
    username: NEO4J_USERNAME,
    password: NEO4J_PASSWORD,
    database: NEO4J_DATABASE,
    verify: NEO4J_VERIFY,
  });
  const { stop } = await start({ graph, port: PORT });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("server_stopping", { signal });
    stop().catch((err: unknown) => {
      logger.error("shutdown_failed", { err });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntrypoint()) {
  main().catch((err: unknown) => {
    logger.error("startup_failed", { err });
    process.exitCode = 1;
  });
}
