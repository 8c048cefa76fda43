import { describe, it, expect } from "vitest";
import { createFrameDecoder, encodeFrame } from "../../../../src/core/transport/framing.js";
import { FramingError } from "../../../../src/core/errors.js";
import { descriptorKey } from "../../../../src/core/transport/types.js";

describe("encodeFrame", () => {
  it("terminates newline frames with a single LF", () => {
    expect(encodeFrame("newline", '{"a":1}').toString("utf-8")).toBe('{"a":1}\n');
  });

  it("rejects payloads containing a newline", () => {
    expect(() => encodeFrame("newline", "{\n}")).toThrow(FramingError);
  });

  it("counts bytes, not characters, for Content-Length", () => {
    const frame = encodeFrame("content-length", '"é"').toString("utf-8");
    expect(frame).toBe('Content-Length: 4\r\n\r\n"é"');
  });
});

describe("newline decoder", () => {
  it("emits complete lines and holds back the rest", () => {
    const decoder = createFrameDecoder("newline");

    expect(decoder.push(Buffer.from('{"id":1}\n{"id"'))).toEqual(['{"id":1}']);
    expect(decoder.buffered).toBe(5);
    expect(decoder.push(Buffer.from(":2}\n"))).toEqual(['{"id":2}']);
    expect(decoder.buffered).toBe(0);
  });

  it("strips CR and skips blank lines", () => {
    const decoder = createFrameDecoder("newline");
    expect(decoder.push(Buffer.from('{"a":1}\r\n\r\n  \n{"b":2}\n'))).toEqual(['{"a":1}', '{"b":2}']);
  });

  it("reassembles a multi-byte character split across chunks", () => {
    const decoder = createFrameDecoder("newline");
    const bytes = Buffer.from('"é"\n', "utf-8");

    expect(decoder.push(bytes.subarray(0, 2))).toEqual([]);
    expect(decoder.push(bytes.subarray(2))).toEqual(['"é"']);
  });
});

describe("content-length decoder", () => {
  it("decodes back-to-back frames in one chunk", () => {
    const decoder = createFrameDecoder("content-length");
    const chunk = Buffer.concat([encodeFrame("content-length", '{"id":1}'), encodeFrame("content-length", "[]")]);

    expect(decoder.push(chunk)).toEqual(['{"id":1}', "[]"]);
  });

  it("waits for the body across chunks", () => {
    const decoder = createFrameDecoder("content-length");

    expect(decoder.push(Buffer.from("Content-Length: 8\r\n\r\n{\"id\""))).toEqual([]);
    expect(decoder.push(Buffer.from(":1}"))).toEqual(['{"id":1}']);
  });

  it("ignores other headers and header case", () => {
    const decoder = createFrameDecoder("content-length");
    const chunk = Buffer.from("Content-Type: application/json\r\ncontent-length: 2\r\n\r\n{}");

    expect(decoder.push(chunk)).toEqual(["{}"]);
  });

  it("fails without a Content-Length header", () => {
    const decoder = createFrameDecoder("content-length");
    expect(() => decoder.push(Buffer.from("X-Other: 1\r\n\r\n{}"))).toThrow("Missing Content-Length header");
  });

  it("fails on a non-numeric length", () => {
    const decoder = createFrameDecoder("content-length");
    expect(() => decoder.push(Buffer.from("Content-Length: abc\r\n\r\n"))).toThrow(
      "Invalid Content-Length value: abc"
    );
  });

  it("fails when the header block never terminates", () => {
    const decoder = createFrameDecoder("content-length");
    expect(() => decoder.push(Buffer.alloc(9000, 0x41))).toThrow(FramingError);
  });
});

describe("descriptorKey", () => {
  it("ignores env ordering", () => {
    const a = descriptorKey({ command: "node", args: ["s.js"], env: { A: "1", B: "2" } });
    const b = descriptorKey({ command: "node", args: ["s.js"], env: { B: "2", A: "1" } });
    expect(a).toBe(b);
  });

  it("distinguishes args", () => {
    expect(descriptorKey({ command: "node", args: ["a.js"] })).not.toBe(descriptorKey({ command: "node", args: ["b.js"] }));
  });
});
