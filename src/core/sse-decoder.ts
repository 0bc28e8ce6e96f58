// ============================================
// Server-sent event decoder for streamed completions
// ============================================
//
// Chunks arrive at arbitrary boundaries. Complete lines are taken from the
// front of a buffer; a partial line waits for the next chunk. Each
// `data: {...}` line may carry one content fragment; `data: [DONE]` ends the
// stream even if more bytes follow.
// ============================================

import { z } from "zod";

export const DONE_SENTINEL = "[DONE]";

const DATA_PREFIX = "data:";

const StreamChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullable().optional(),
        })
        .optional(),
    }),
  ),
});

export type EventLine = { kind: "done" } | { kind: "fragment"; text: string };

/**
 * Classify one line of the event stream. `null` means the line carries
 * nothing: blank, not a data line, malformed JSON, or an empty delta.
 */
export function classifyEventLine(rawLine: string): EventLine | null {
  const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
  if (!line.trim() || !line.startsWith(DATA_PREFIX)) return null;

  const payload = line.slice(DATA_PREFIX.length).trim();
  if (payload === DONE_SENTINEL) return { kind: "done" };

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return null;
  }

  const chunk = StreamChunkSchema.safeParse(json);
  if (!chunk.success) return null;

  const content = chunk.data.choices[0]?.delta?.content;
  return content ? { kind: "fragment", text: content } : null;
}

/** Yield content fragments, in order, until `[DONE]` or end of input. */
export async function* decodeEventStream(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let buffer = "";

  for await (const chunk of chunks) {
    buffer += chunk;

    let newline = buffer.indexOf("\n");
    while (newline !== -1) {
      const line = buffer.slice(0, newline);
      buffer = buffer.slice(newline + 1);

      const event = classifyEventLine(line);
      if (event?.kind === "done") return;
      if (event) yield event.text;

      newline = buffer.indexOf("\n");
    }
  }

  // Input ended without a trailing newline.
  const last = classifyEventLine(buffer);
  if (last?.kind === "fragment") yield last.text;
}

/** Run the decoder to completion, reporting each fragment as it arrives. */
export async function collectStream(
  chunks: AsyncIterable<string>,
  onFragment?: (fragment: string) => void,
): Promise<string> {
  let full = "";
  for await (const fragment of decodeEventStream(chunks)) {
    full += fragment;
    onFragment?.(fragment);
  }
  return full;
}

interface ByteStreamReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(): Promise<void>;
  releaseLock(): void;
}

/** A fetch response body, as far as this module needs it. */
export interface ByteStream {
  getReader(): ByteStreamReader;
}

/**
 * Turn a response body into text chunks. Multi-byte characters split across
 * network chunks are held back until complete. If the consumer stops early
 * (e.g. at `[DONE]`) the body is cancelled.
 */
export async function* readTextChunks(body: ByteStream): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let finished = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield decoder.decode(value, { stream: true });
    }
    finished = true;
    const tail = decoder.decode();
    if (tail) yield tail;
  } finally {
    if (!finished) await reader.cancel();
    reader.releaseLock();
  }
}
