/**
 * Line-buffered reader for chunked G-code text.
 *
 * Chunks may split lines anywhere; complete lines are emitted in order with
 * their 1-based line number. CRLF and LF endings are both accepted.
 */

export interface GcodeLineReaderCallbacks {
  onLine: (line: string, lineNumber: number) => void;
}

export class GcodeLineReader {
  private buffer = '';
  private lineNumber = 0;
  private readonly onLine: (line: string, lineNumber: number) => void;

  constructor(callbacks: GcodeLineReaderCallbacks) {
    this.onLine = callbacks.onLine;
  }

  /** Lines emitted so far. */
  get linesRead(): number {
    return this.lineNumber;
  }

  processChunk(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() || '';
    for (const line of lines) {
      this.emit(line);
    }
  }

  /** Emits a final unterminated line, if any. */
  flush(): void {
    if (this.buffer.length > 0) {
      this.emit(this.buffer);
      this.buffer = '';
    }
  }

  private emit(line: string): void {
    this.lineNumber++;
    this.onLine(line.endsWith('\r') ? line.slice(0, -1) : line, this.lineNumber);
  }
}
