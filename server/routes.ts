import type { Express, Response } from "express";
import multer from "multer";
import type { ZodError } from "zod";
import { framesRequestSchema, viewsRequestSchema } from "@shared/schema";
import { aggregatedFramesToJson } from "@shared/frame-aggregation";
import { buildViews, collectRequestedKeys } from "@shared/views";
import { InsufficientDataError, ParseError, describeError } from "@shared/errors";
import type { FrameStore } from "./frame-store";
import { readFrameSourceFromText } from "./stream-utils";
import { log } from "./log";

export const MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES },
});

function formatZodError(error: ZodError) {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function sendError(res: Response, tag: string, error: unknown) {
  if (error instanceof ParseError) {
    return res.status(400).json({ error: error.message });
  }
  if (error instanceof InsufficientDataError) {
    return res.status(422).json({ error: error.message });
  }
  console.error(`[${tag}] ${describeError(error)}`);
  return res.status(500).json({ error: `Failed to build ${tag}.` });
}

function uniqueKeys(...lists: string[][]) {
  return [...new Set(lists.flat())];
}

export function registerRoutes(app: Express, store: FrameStore) {
  app.get("/api/sources", (_req, res) => {
    res.json({ sources: store.listSources() });
  });

  app.get("/api/keys", (_req, res) => {
    const keys = store.getKeys();
    res.json({ keys, count: keys.length });
  });

  app.post("/api/frames", (req, res) => {
    const parsed = framesRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: formatZodError(parsed.error) });
    }
    try {
      const { keys, beginFrame, endFrame } = parsed.data;
      const frames = store.aggregate({ keys, beginFrame, endFrame });
      return res.json({ beginFrame, endFrame, sources: aggregatedFramesToJson(frames) });
    } catch (error) {
      return sendError(res, "frames", error);
    }
  });

  app.post("/api/views", (req, res) => {
    const parsed = viewsRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: formatZodError(parsed.error) });
    }
    try {
      const { beginFrame, endFrame, ...request } = parsed.data;
      const frames = store.aggregate({
        keys: uniqueKeys(store.getKeys(), collectRequestedKeys(request)),
        beginFrame,
        endFrame,
      });
      const views = buildViews(frames, request);
      return res.json({ views, count: views.length });
    } catch (error) {
      return sendError(res, "views", error);
    }
  });

  app.post("/api/upload", upload.single("file"), async (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }
    try {
      const name = req.file.originalname || `upload-${Date.now()}`;
      const replaced = store.hasSource(name);
      const loaded = await readFrameSourceFromText(name, req.file.buffer.toString("utf-8"));
      store.setSource(name, loaded.frames);
      log(`${replaced ? "replaced" : "added"} source ${name} (${loaded.frames.length} frames)`, "upload");
      return res.json({ success: true, name, frameCount: loaded.frames.length, replaced });
    } catch (error) {
      return sendError(res, "upload", error);
    }
  });
}
