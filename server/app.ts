import express, { type NextFunction, type Request, type Response } from "express";
import { describeError } from "@shared/errors";
import { encodeNonFiniteNumbers } from "@shared/frame-aggregation";
import type { FrameStore } from "./frame-store";
import { registerRoutes } from "./routes";
import { log } from "./log";

const BODY_LOG_LIMIT = 2000;

export function summarizeResponseBody(body: unknown): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  if (!body || typeof body !== "object") {
    return summary;
  }
  const candidate = body as Record<string, unknown>;

  if (typeof candidate.success === "boolean") summary.success = candidate.success;
  if (typeof candidate.error === "string") summary.error = candidate.error;
  if (typeof candidate.name === "string") summary.name = candidate.name;
  if (typeof candidate.count === "number") summary.count = candidate.count;
  if (typeof candidate.frameCount === "number") summary.frameCount = candidate.frameCount;

  if (Array.isArray(candidate.sources)) {
    summary.sourcesCount = candidate.sources.length;
  } else if (candidate.sources && typeof candidate.sources === "object") {
    summary.sourcesCount = Object.keys(candidate.sources).length;
  }

  return summary;
}

export function createApp(store: FrameStore, env: NodeJS.ProcessEnv = process.env) {
  const app = express();
  app.set("json replacer", encodeNonFiniteNumbers);

  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false }));

  if (env.NODE_ENV !== "production") {
    app.use((_req, res, next) => {
      res.setHeader("Cache-Control", "no-store");
      res.setHeader("Pragma", "no-cache");
      res.setHeader("Expires", "0");
      next();
    });
  }

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      if (!path.startsWith("/api")) {
        return;
      }
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        if (env.LOG_API_BODY === "true") {
          let serialized = "";
          try {
            serialized = JSON.stringify(capturedJsonResponse);
          } catch {
            serialized = "[unserializable json]";
          }
          logLine += ` :: ${
            serialized.length > BODY_LOG_LIMIT
              ? `${serialized.slice(0, BODY_LOG_LIMIT)}... (${serialized.length} chars)`
              : serialized
          }`;
        } else {
          const summary = summarizeResponseBody(capturedJsonResponse);
          if (Object.keys(summary).length > 0) {
            logLine += ` :: ${JSON.stringify(summary)}`;
          }
        }
      }
      log(logLine, "express");
    });

    next();
  });

  registerRoutes(app, store);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const candidate = err && typeof err === "object" ? (err as Record<string, unknown>) : {};
    const status =
      typeof candidate.status === "number"
        ? candidate.status
        : typeof candidate.statusCode === "number"
          ? candidate.statusCode
          : 500;
    const message = describeError(err) || "Internal Server Error";

    if (status >= 500) {
      console.error("[express] Unhandled error:", err);
    }
    res.status(status).json({ error: message });
  });

  return app;
}
