import type { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";

function field(err: unknown, key: "status" | "message"): unknown {
  return typeof err === "object" && err !== null && key in err ? Reflect.get(err, key) : undefined;
}

// Only framework-level failures get here (e.g. an unparseable JSON body);
// query errors are handled inside the stream.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const rawStatus = field(err, "status");
  const rawMessage = field(err, "message");
  const status = typeof rawStatus === "number" ? rawStatus : 500;
  const message = typeof rawMessage === "string" && rawMessage ? rawMessage : "Internal error";
  logger.error("request_error", { method: req.method, path: req.path, status, message });
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json({ error: message });
}
