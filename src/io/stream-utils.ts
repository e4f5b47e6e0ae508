/**
 * Line handling for text track files
 *
 * Turns decoded byte chunks into lines and filters comment lines, for both
 * in-memory text and streamed file content.
 */

const LINE_BREAK = /\r?\n/;
const COMMENT_PREFIX = "#";

/**
 * Convert an async sequence of byte chunks into lines
 *
 * Handles line buffering so complete lines are yielded even when chunk
 * boundaries fall inside a line or a multi-byte character. Line terminators
 * (`\n` or `\r\n`) are not included; a final line without a terminator is
 * still yielded.
 *
 * @example
 * ```typescript
 * const handle = await openMaybeGzip("/data/chr21.fa.gz");
 * for await (const line of readLines(handle.chunks())) {
 *   if (line.startsWith(">")) console.log("Found header:", line);
 * }
 * ```
 */
export async function* readLines(chunks: AsyncIterable<Uint8Array>): AsyncIterable<string> {
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });

    const lines = buffer.split(LINE_BREAK);
    buffer = lines.pop() ?? "";
    yield* lines;
  }

  buffer += decoder.decode();
  if (buffer.length > 0) {
    yield buffer;
  }
}

/**
 * Split text into lines, dropping the empty string after a final terminator
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Whether a line is a `#` comment
 */
export function isComment(line: string): boolean {
  return line.startsWith(COMMENT_PREFIX);
}

/**
 * Drop `#` comment lines from a line sequence
 */
export function* ignoreComments(lines: Iterable<string>): Iterable<string> {
  for (const line of lines) {
    if (!isComment(line)) yield line;
  }
}

/**
 * Drop `#` comment lines from an async line sequence
 */
export async function* ignoreCommentsAsync(lines: AsyncIterable<string>): AsyncIterable<string> {
  for await (const line of lines) {
    if (!isComment(line)) yield line;
  }
}

/**
 * Lift a synchronous line sequence into an async one
 */
export async function* toAsyncLines(lines: Iterable<string>): AsyncIterable<string> {
  yield* lines;
}

/**
 * Concatenate byte chunks into a single buffer
 */
export function concatChunks(chunks: readonly Uint8Array[]): Uint8Array {
  const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;

  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }

  return result;
}

export const StreamUtils = {
  readLines,
  splitLines,
  ignoreComments,
  ignoreCommentsAsync,
  concatChunks,
} as const;
