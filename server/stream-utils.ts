import * as fs from "fs";
import { Readable } from "stream";
import { StringDecoder } from "string_decoder";
import type { FrameRecord, FrameSources } from "@shared/schema";
import { STDIN_SOURCE } from "@shared/schema";
import { FrameLogReader } from "@shared/log-reader";

export type LineConsumerResult = {
  bytesRead: number;
  lineCount: number;
  remainder: string;
};

export function createAbortError() {
  const error = new Error("AbortError");
  error.name = "AbortError";
  return error;
}

export async function consumeLineStream(options: {
  readable: Readable;
  signal?: AbortSignal;
  onLine: (line: string) => void;
}): Promise<LineConsumerResult> {
  const { readable, signal, onLine } = options;
  // Byte streams such as stdin can split a multi-byte character across chunks.
  const decoder = new StringDecoder("utf8");
  let remainder = "";
  let bytesRead = 0;
  let lineCount = 0;
  const abortHandler = () => {
    readable.destroy(createAbortError());
  };

  if (signal) {
    if (signal.aborted) {
      abortHandler();
    } else {
      signal.addEventListener("abort", abortHandler, { once: true });
    }
  }

  try {
    const consumeText = (text: string) => {
      const parts = (remainder + text).split("\n");
      remainder = parts.pop() ?? "";
      for (const part of parts) {
        lineCount += 1;
        onLine(part);
      }
    };
    for await (const chunk of readable) {
      if (typeof chunk === "string") {
        bytesRead += Buffer.byteLength(chunk, "utf-8");
        consumeText(chunk);
      } else {
        const bytes = Buffer.from(chunk);
        bytesRead += bytes.length;
        consumeText(decoder.write(bytes));
      }
    }
    consumeText(decoder.end());
  } finally {
    if (signal) {
      signal.removeEventListener("abort", abortHandler);
    }
  }

  return { bytesRead, lineCount, remainder };
}

export type LoadedFrameSource = {
  name: string;
  frames: FrameRecord[];
  bytesRead: number;
  lineCount: number;
};

/**
 * Reads one log to the end and returns its completed frames. A last line
 * without a trailing newline is still parsed; the frame it belongs to is not
 * complete and is dropped like any other open frame.
 */
export async function readFrameSource(options: {
  name: string;
  readable: Readable;
  signal?: AbortSignal;
}): Promise<LoadedFrameSource> {
  const reader = new FrameLogReader(options.name);
  const frames: FrameRecord[] = [];
  const pushLine = (line: string) => {
    const completed = reader.pushLine(line);
    if (completed) {
      frames.push(completed);
    }
  };

  const result = await consumeLineStream({
    readable: options.readable,
    signal: options.signal,
    onLine: pushLine,
  });
  if (result.remainder) {
    pushLine(result.remainder);
  }

  return {
    name: options.name,
    frames,
    bytesRead: result.bytesRead,
    lineCount: result.lineCount + (result.remainder ? 1 : 0),
  };
}

export function readFrameSourceFromFile(filePath: string, signal?: AbortSignal) {
  return readFrameSource({
    name: filePath,
    readable: fs.createReadStream(filePath, { encoding: "utf-8" }),
    signal,
  });
}

export function readFrameSourceFromText(name: string, text: string) {
  return readFrameSource({
    name,
    readable: Readable.from([text], { encoding: "utf-8" }),
  });
}

/**
 * Loads every path in order, one after the other. With no paths the single
 * source is `stdin`.
 */
export async function loadFrameSources(options: {
  paths: readonly string[];
  stdin?: Readable;
  signal?: AbortSignal;
  onLoaded?: (source: LoadedFrameSource) => void;
}): Promise<FrameSources> {
  const sources: FrameSources = new Map();
  const loaded: LoadedFrameSource[] = [];

  if (options.paths.length === 0) {
    loaded.push(
      await readFrameSource({
        name: STDIN_SOURCE,
        readable: options.stdin ?? process.stdin,
        signal: options.signal,
      }),
    );
  } else {
    for (const filePath of options.paths) {
      loaded.push(await readFrameSourceFromFile(filePath, options.signal));
    }
  }

  loaded.forEach((source) => {
    sources.set(source.name, source.frames);
    options.onLoaded?.(source);
  });
  return sources;
}
