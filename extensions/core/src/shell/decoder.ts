/**
 * Splits a byte stream into newline-terminated lines and decodes each one as
 * strict UTF-8. Lines that fail to decode are handed to `onUndecodable`
 * instead of being emitted.
 */

const NEWLINE = 0x0a;

export type LineSink = (line: string) => void;
export type UndecodableSink = (raw: Buffer) => void;

export class LineDecoder {
  private pending: Buffer = Buffer.alloc(0);
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(
    private readonly onLine: LineSink,
    private readonly onUndecodable: UndecodableSink,
  ) {}

  push(chunk: Buffer): void {
    let data: Buffer = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    let index = data.indexOf(NEWLINE);
    while (index !== -1) {
      this.emit(data.subarray(0, index));
      data = data.subarray(index + 1);
      index = data.indexOf(NEWLINE);
    }
    this.pending = Buffer.from(data);
  }

  /** Flush a final line that had no terminating newline. */
  end(): void {
    if (this.pending.length > 0) this.emit(this.pending);
    this.pending = Buffer.alloc(0);
  }

  private emit(raw: Buffer): void {
    let line: string;
    try {
      line = this.decoder.decode(raw);
    } catch {
      this.onUndecodable(raw);
      return;
    }
    this.onLine(line.trimEnd());
  }
}

/** Decode a complete buffer into trimmed lines. */
export function decodeLines(buffer: Buffer, onUndecodable: UndecodableSink): string[] {
  const lines: string[] = [];
  const decoder = new LineDecoder((line) => lines.push(line), onUndecodable);
  decoder.push(buffer);
  decoder.end();
  return lines;
}
