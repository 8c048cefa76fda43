/**
 * Message framing on top of a continuous byte stream.
 *
 * - newline: one JSON document per line (`\r\n` tolerated, blank lines ignored)
 * - content-length: `Content-Length: N\r\n\r\n` header block followed by N bytes
 */
import { FramingError } from "../errors.js";
import type { FramingMode } from "./types.js";

const HEADER_DELIMITER = Buffer.from("\r\n\r\n");
const MAX_HEADER_BYTES = 8 * 1024;

export interface FrameDecoder {
  /** Feed a chunk; returns every frame completed by it, in order. */
  push(chunk: Buffer): string[];
  /** Bytes held back waiting for the rest of a frame. */
  readonly buffered: number;
}

export function encodeFrame(mode: FramingMode, payload: string): Buffer {
  if (mode === "newline") {
    if (payload.includes("\n")) {
      throw new FramingError("Newline-framed payload must not contain a newline");
    }
    return Buffer.from(`${payload}\n`, "utf-8");
  }

  const body = Buffer.from(payload, "utf-8");
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, "ascii");
  return Buffer.concat([header, body]);
}

export function createFrameDecoder(mode: FramingMode): FrameDecoder {
  return mode === "newline" ? new LineDecoder() : new ContentLengthDecoder();
}

class LineDecoder implements FrameDecoder {
  private pending: Buffer = Buffer.alloc(0);

  get buffered(): number {
    return this.pending.length;
  }

  push(chunk: Buffer): string[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const frames: string[] = [];

    let newline = this.pending.indexOf(0x0a);
    while (newline !== -1) {
      const line = this.pending.subarray(0, newline).toString("utf-8").replace(/\r$/, "");
      this.pending = this.pending.subarray(newline + 1);
      if (line.trim().length > 0) frames.push(line);
      newline = this.pending.indexOf(0x0a);
    }

    return frames;
  }
}

class ContentLengthDecoder implements FrameDecoder {
  private pending: Buffer = Buffer.alloc(0);
  private expected: number | null = null;

  get buffered(): number {
    return this.pending.length;
  }

  push(chunk: Buffer): string[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const frames: string[] = [];

    for (;;) {
      if (this.expected === null) {
        const end = this.pending.indexOf(HEADER_DELIMITER);
        if (end === -1) {
          if (this.pending.length > MAX_HEADER_BYTES) {
            throw new FramingError("Header block exceeds 8KiB without terminator");
          }
          break;
        }
        this.expected = parseContentLength(this.pending.subarray(0, end).toString("ascii"));
        this.pending = this.pending.subarray(end + HEADER_DELIMITER.length);
      }

      if (this.pending.length < this.expected) break;

      frames.push(this.pending.subarray(0, this.expected).toString("utf-8"));
      this.pending = this.pending.subarray(this.expected);
      this.expected = null;
    }

    return frames;
  }
}

function parseContentLength(headerBlock: string): number {
  for (const line of headerBlock.split("\r\n")) {
    const separator = line.indexOf(":");
    if (separator === -1) continue;
    const name = line.slice(0, separator).trim().toLowerCase();
    if (name !== "content-length") continue;

    const value = line.slice(separator + 1).trim();
    if (!/^\d+$/.test(value)) {
      throw new FramingError(`Invalid Content-Length value: ${value}`);
    }
    return parseInt(value, 10);
  }
  throw new FramingError("Missing Content-Length header");
}
