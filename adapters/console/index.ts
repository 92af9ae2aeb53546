import type { Animal, Observer } from "@pattern-demos/core";
import type { LineSink } from "../types";
import { LineWriter } from "./writer";

/** Observer that prints each broadcast animal as one line. */
export class ConsoleObserver implements Observer {
  private readonly writer: LineWriter;

  constructor(sink: LineSink | LineWriter = process.stdout) {
    this.writer = sink instanceof LineWriter ? sink : new LineWriter(sink);
  }

  update(animal: Animal): void {
    this.writer.writeLine(`Observer: ${animal.display()}`);
  }

  /** Resolves once every line written so far has reached the sink. */
  flush(): Promise<void> {
    return this.writer.flush();
  }
}

export { LineWriter } from "./writer";
