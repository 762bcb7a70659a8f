/**
 * Line buffer for stream-based text protocols.
 *
 * Data arrives in arbitrary chunks that may split across lines or even
 * across UTF-8 multi-byte characters. This buffer accumulates partial data
 * and yields complete lines. Empty lines are kept: in an event stream they
 * are the record delimiter.
 */
export class LineBuffer {
  private buffer = "";
  private readonly decoder = new TextDecoder("utf-8", { fatal: false });

  /**
   * Feed raw bytes into the buffer.
   * Returns every complete line, without its terminator, in arrival order.
   * An unterminated tail stays buffered until a later chunk ends it.
   */
  feed(chunk: Uint8Array): string[] {
    this.buffer += this.decoder.decode(chunk, { stream: true });

    const lines: string[] = [];

    let newlineIdx = this.buffer.indexOf("\n");
    while (newlineIdx !== -1) {
      let line = this.buffer.slice(0, newlineIdx);
      this.buffer = this.buffer.slice(newlineIdx + 1);
      newlineIdx = this.buffer.indexOf("\n");

      // Strip trailing \r for \r\n
      if (line.endsWith("\r")) {
        line = line.slice(0, -1);
      }

      lines.push(line);
    }

    return lines;
  }
}
