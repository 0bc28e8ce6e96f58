import { ReadableStream } from "node:stream/web";
import { describe, it, expect } from "vitest";
import {
  classifyEventLine,
  collectStream,
  decodeEventStream,
  readTextChunks,
} from "../core/sse-decoder.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* fromChunks(chunks: string[]): AsyncGenerator<string> {
  for (const chunk of chunks) yield chunk;
}

async function decodeAll(chunks: string[]): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of decodeEventStream(fromChunks(chunks))) {
    fragments.push(fragment);
  }
  return fragments;
}

function event(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`;
}

const HELLO_STREAM =
  'data: {"choices":[{"delta":{"content":"Hel"}}]}\n\n' +
  'data: {"choices":[{"delta":{"content":"lo"}}]}\n\n' +
  "data: [DONE]\n\n";

// ---------------------------------------------------------------------------
// classifyEventLine
// ---------------------------------------------------------------------------

describe("classifyEventLine", () => {
  it("extracts the first choice's delta content", () => {
    expect(classifyEventLine('data: {"choices":[{"delta":{"content":"Hi"}}]}')).toEqual({
      kind: "fragment",
      text: "Hi",
    });
  });

  it("accepts data lines without a space after the marker", () => {
    expect(classifyEventLine('data:{"choices":[{"delta":{"content":"x"}}]}')).toEqual({
      kind: "fragment",
      text: "x",
    });
  });

  it("recognizes the termination sentinel", () => {
    expect(classifyEventLine("data: [DONE]")).toEqual({ kind: "done" });
    expect(classifyEventLine("data:[DONE]\r")).toEqual({ kind: "done" });
  });

  it("ignores blank, comment and non-data lines", () => {
    expect(classifyEventLine("")).toBeNull();
    expect(classifyEventLine("   ")).toBeNull();
    expect(classifyEventLine(": keep-alive")).toBeNull();
    expect(classifyEventLine("event: message")).toBeNull();
  });

  it("yields nothing for empty or absent content", () => {
    expect(classifyEventLine('data: {"choices":[{"delta":{"content":""}}]}')).toBeNull();
    expect(classifyEventLine('data: {"choices":[{"delta":{"role":"assistant"}}]}')).toBeNull();
    expect(classifyEventLine('data: {"choices":[{"delta":{"content":null}}]}')).toBeNull();
    expect(classifyEventLine('data: {"choices":[]}')).toBeNull();
  });

  it("skips malformed payloads", () => {
    expect(classifyEventLine("data: {not json")).toBeNull();
    expect(classifyEventLine('data: {"choices":"nope"}')).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// decodeEventStream
// ---------------------------------------------------------------------------

describe("decodeEventStream", () => {
  it("decodes the Hel/lo example and stops at [DONE]", async () => {
    await expect(decodeAll([HELLO_STREAM])).resolves.toEqual(["Hel", "lo"]);
  });

  it("produces the same text however the stream is split", async () => {
    const splits = [
      [HELLO_STREAM],
      HELLO_STREAM.split(""),
      [HELLO_STREAM.slice(0, 7), HELLO_STREAM.slice(7, 50), HELLO_STREAM.slice(50)],
      [HELLO_STREAM.slice(0, 44), HELLO_STREAM.slice(44, 45), HELLO_STREAM.slice(45)],
    ];

    for (const chunks of splits) {
      const fragments = await decodeAll(chunks);
      expect(fragments.join("")).toBe("Hello");
    }
  });

  it("stops at the sentinel even when more data follows it", async () => {
    const fragments = await decodeAll([event("a") + "data: [DONE]\n" + event("never")]);

    expect(fragments).toEqual(["a"]);
  });

  it("does not read chunks after the sentinel", async () => {
    let pulled = 0;
    async function* source(): AsyncGenerator<string> {
      for (const chunk of [event("one"), "data: [DONE]\n", event("two")]) {
        pulled += 1;
        yield chunk;
      }
    }

    const fragments: string[] = [];
    for await (const fragment of decodeEventStream(source())) fragments.push(fragment);

    expect(fragments).toEqual(["one"]);
    expect(pulled).toBe(2);
  });

  it("keeps decoding around a malformed event", async () => {
    const fragments = await decodeAll([event("good "), "data: {broken\n", event("still good")]);

    expect(fragments).toEqual(["good ", "still good"]);
  });

  it("handles CRLF line endings", async () => {
    const fragments = await decodeAll([
      'data: {"choices":[{"delta":{"content":"a"}}]}\r\n\r\n',
      'data: {"choices":[{"delta":{"content":"b"}}]}\r\n\r\ndata: [DONE]\r\n',
    ]);

    expect(fragments).toEqual(["a", "b"]);
  });

  it("ends with the input and decodes a final unterminated line", async () => {
    const fragments = await decodeAll([event("x"), 'data: {"choices":[{"delta":{"content":"y"}}]}']);

    expect(fragments).toEqual(["x", "y"]);
  });
});

// ---------------------------------------------------------------------------
// collectStream / readTextChunks
// ---------------------------------------------------------------------------

describe("collectStream", () => {
  it("reports fragments as they arrive and returns the full text", async () => {
    const seen: string[] = [];

    const full = await collectStream(fromChunks([event("The "), event("answer"), event(".")]), (f) =>
      seen.push(f),
    );

    expect(seen).toEqual(["The ", "answer", "."]);
    expect(full).toBe("The answer.");
  });
});

describe("readTextChunks", () => {
  it("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode(event("héllo ✓"));
    const cut = bytes.indexOf(0xc3) + 1;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.slice(0, cut));
        controller.enqueue(bytes.slice(cut));
        controller.close();
      },
    });

    await expect(collectStream(readTextChunks(body))).resolves.toBe("héllo ✓");
  });

  it("cancels the body when decoding stops early", async () => {
    let cancelled = false;
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode(event("a") + "data: [DONE]\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    await expect(collectStream(readTextChunks(body))).resolves.toBe("a");
    expect(cancelled).toBe(true);
  });
});
