/**
 * Stream processing utilities for line-oriented text
 */

import { BufferError, HapkitError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const DEFAULT_MAX_LINE_LENGTH = 1_000_000;

/**
 * Convert a byte stream to an async iterable of lines
 *
 * Lines end with `\n` or `\r\n`; the terminator is not part of the yielded
 * line. Blank lines are yielded so callers can keep line numbers aligned
 * with the source.
 *
 * @throws {BufferError} If a line exceeds `maxLineLength`
 * @throws {StreamError} If the underlying stream fails
 *
 * @example
 * ```typescript
 * const stream = await createStream("cohort.hap");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("H\t")) console.log(line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let exhausted = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        exhausted = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer, maxLineLength);
    yield* result.lines;
    if (result.remainder.length > 0) {
      yield stripCarriageReturn(result.remainder);
    }
  } catch (error) {
    if (error instanceof HapkitError) throw error;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    // Stopped early by an error or by the consumer; close the source
    if (!exhausted) await reader.cancel();
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and an unterminated remainder
 *
 * @throws {BufferError} If a line exceeds `maxLineLength`
 */
export function processBuffer(
  buffer: string,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const line = stripCarriageReturn(buffer.slice(lineStart, newline));
    checkLineLength(line.length, maxLineLength);
    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  const remainder = buffer.slice(lineStart);
  checkLineLength(remainder.length, maxLineLength);

  return { lines, remainder };
}

/**
 * Split an in-memory string into lines the same way {@link readLines} does
 */
export function splitLines(data: string): string[] {
  if (data.length === 0) return [];
  const lines = data.split("\n").map(stripCarriageReturn);
  if (data.endsWith("\n")) lines.pop();
  return lines;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function checkLineLength(length: number, maxLineLength: number): void {
  if (length > maxLineLength) {
    throw new BufferError(
      `Line too long: ${length} characters exceeds maximum ${maxLineLength}`,
      length,
      "overflow"
    );
  }
}

export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
} as const;
