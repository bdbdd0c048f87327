import type { FrameRecord } from "./schema";
import { ParseError } from "./errors";
import { parseScalar } from "./scalar";

export const FRAME_START_MARKER = "Stats Viewer";
export const CAMERA_SECTION_MARKER = "Stats Camera";
export const METRIC_INDENT = "    ";

export function cameraQualifiedKey(key: string, camera: number): string {
  return `${key} Camera ${camera}`;
}

function stripLineTerminator(line: string): string {
  if (line.endsWith("\r\n")) {
    return line.slice(0, -2);
  }
  if (line.endsWith("\n") || line.endsWith("\r")) {
    return line.slice(0, -1);
  }
  return line;
}

/**
 * Incremental parser for stats viewer output.
 *
 * Lines are fed one at a time. A frame-start line closes the record in
 * progress and hands it back; camera-section lines switch metric keys to their
 * camera-qualified form until the next frame start. The record still open when
 * input ends is never returned.
 */
export class FrameLogReader {
  private frame: Record<string, number> | null = null;
  private camera = 0;
  private lineNumber = 0;

  constructor(private readonly sourceName?: string) {}

  get cameraCount(): number {
    return this.camera;
  }

  get hasOpenFrame(): boolean {
    return this.frame !== null;
  }

  reset(): void {
    this.frame = null;
    this.camera = 0;
    this.lineNumber = 0;
  }

  pushLine(rawLine: string): FrameRecord | null {
    this.lineNumber += 1;
    const line = stripLineTerminator(rawLine);

    if (line.startsWith(FRAME_START_MARKER)) {
      return this.startFrame(line);
    }
    if (line.startsWith(CAMERA_SECTION_MARKER)) {
      this.camera += 1;
      return null;
    }
    if (line.startsWith(METRIC_INDENT)) {
      this.addMetric(line);
    }
    return null;
  }

  private startFrame(line: string): FrameRecord | null {
    // Marker words first; the last two tokens are the frame's key and value.
    const tokens = line.trim().split(/\s+/);
    if (tokens.length < 4) {
      throw this.parseError(`frame start needs at least 4 tokens, got ${tokens.length}`, line);
    }
    const key = tokens[tokens.length - 2];
    const value = this.parseValue(tokens[tokens.length - 1]);
    const completed = this.frame ? Object.freeze(this.frame) : null;
    if (completed) {
      this.camera = 0;
    }
    this.frame = { [key]: value };
    return completed;
  }

  private addMetric(line: string): void {
    const content = line.trim();
    const match = /^(.*\S)\s+(\S+)$/.exec(content);
    if (!match) {
      throw this.parseError("metric line has no value", content);
    }
    const key = this.camera > 0 ? cameraQualifiedKey(match[1], this.camera) : match[1];
    const value = this.parseValue(match[2]);
    if (!this.frame) {
      this.frame = {};
    }
    // Plain assignment would hit the prototype setter for a "__proto__" key.
    Object.defineProperty(this.frame, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    });
  }

  private parseValue(token: string): number {
    try {
      return parseScalar(token);
    } catch (error) {
      if (error instanceof ParseError) {
        throw this.parseError(`invalid numeric value "${token}"`, token);
      }
      throw error;
    }
  }

  private parseError(message: string, token: string): ParseError {
    return new ParseError(message, token, {
      source: this.sourceName,
      lineNumber: this.lineNumber,
    });
  }
}

export function* readFrameRecords(
  lines: Iterable<string>,
  sourceName?: string,
): Generator<FrameRecord, void, undefined> {
  const reader = new FrameLogReader(sourceName);
  for (const line of lines) {
    const completed = reader.pushLine(line);
    if (completed) {
      yield completed;
    }
  }
}

export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function readFrameRecordsFromText(text: string, sourceName?: string): FrameRecord[] {
  return Array.from(readFrameRecords(splitLines(text), sourceName));
}
