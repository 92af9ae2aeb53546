/**
 * Minimal text sink. `process.stdout` satisfies it; tests pass an in-memory one.
 * The callback fires once the chunk has been handed off, with an error if it could not be.
 */
export interface LineSink {
  write(chunk: string, cb: (err?: Error | null) => void): unknown;
}
