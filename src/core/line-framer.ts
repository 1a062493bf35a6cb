const NEWLINE = 0x0a;
const EMPTY = Buffer.alloc(0);

export interface LineFramerOptions {
  /**
   * Cap on the pending partial line, in bytes. 0 (default) leaves it unbounded:
   * a producer that never writes a newline grows the buffer without limit.
   * When positive, an oversized partial line is emitted as-is and the buffer cleared.
   */
  maxBufferBytes?: number;
}

/** Decode one raw line: invalid UTF-8 becomes U+FFFD, CR and surrounding whitespace are trimmed. */
function decodeLine(raw: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: false }).decode(raw).trim();
}

/**
 * Splits a byte stream into newline-delimited text lines.
 *
 * Chunks may end mid-line (or mid-character); the remainder is kept until the
 * next newline arrives. Lines that are empty after trimming are dropped.
 */
export class LineFramer {
  private buffer: Buffer = EMPTY;
  private readonly maxBufferBytes: number;

  constructor(options: LineFramerOptions = {}) {
    this.maxBufferBytes = options.maxBufferBytes ?? 0;
  }

  /** Bytes held for the current partial line. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /** Append a chunk and return every complete, non-empty line it finished. */
  push(chunk: Uint8Array): string[] {
    if (chunk.length === 0) return [];
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);

    const lines: string[] = [];
    let newline = this.buffer.indexOf(NEWLINE);
    while (newline !== -1) {
      const line = decodeLine(this.buffer.subarray(0, newline));
      this.buffer = this.buffer.subarray(newline + 1);
      if (line) lines.push(line);
      newline = this.buffer.indexOf(NEWLINE);
    }

    if (this.maxBufferBytes > 0 && this.buffer.length > this.maxBufferBytes) {
      const line = decodeLine(this.buffer);
      this.buffer = EMPTY;
      if (line) lines.push(line);
    }

    return lines;
  }

  /** Drop any partial line. Called when the channel it belonged to is torn down. */
  reset(): void {
    this.buffer = EMPTY;
  }
}
