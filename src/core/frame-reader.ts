import { LineBuffer } from "../utils/line-buffer.js";

/**
 * Lazily turn a chunk sequence into lines. Yields empty lines. A tail with
 * no line terminator when the chunks end is dropped: it cannot complete a
 * record. Errors from the source propagate.
 */
export async function* readLines(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<string, void, undefined> {
  const buffer = new LineBuffer();
  for await (const chunk of chunks) {
    yield* buffer.feed(chunk);
  }
}
