import type { LineSink } from "../types";

/**
 * Serializes writes to a sink: each line is handed over only after the
 * previous one has completed, so lines issued together never interleave.
 */
export class LineWriter {
  private tail: Promise<void> = Promise.resolve();
  private failure: Error | undefined;

  constructor(private readonly sink: LineSink) {}

  /** Queue a raw chunk. */
  write(chunk: string): void {
    this.tail = this.tail.then(() => this.send(chunk)).then(
      () => undefined,
      (err: unknown) => {
        this.failure ??= err instanceof Error ? err : new Error(String(err));
      },
    );
  }

  writeLine(line: string): void {
    this.write(line + "\n");
  }

  /** Wait for queued lines. Rejects with the first write error, if any. */
  async flush(): Promise<void> {
    await this.tail;
    if (this.failure) {
      const err = this.failure;
      this.failure = undefined;
      throw err;
    }
  }

  private send(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sink.write(chunk, err => (err ? reject(err) : resolve()));
    });
  }
}
