import * as readline from "readline";
import { LineWriter } from "../adapters/console";

/** What the menu loops need from a console. */
export interface MenuIO {
  print(line: string): void;
  /** Show `query` and read one line; undefined once input has ended. */
  question(query: string): Promise<string | undefined>;
}

/**
 * Line-oriented terminal. Printed lines and prompts share the writer,
 * so observer output queued on the same writer stays in order.
 */
export class Terminal implements MenuIO {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream,
    readonly writer: LineWriter,
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  print(line: string): void {
    this.writer.writeLine(line);
  }

  async question(query: string): Promise<string | undefined> {
    this.writer.write(query);
    await this.writer.flush();
    const next = await this.lines.next();
    return next.done ? undefined : next.value;
  }

  async close(): Promise<void> {
    this.rl.close();
    await this.writer.flush();
  }
}

/** Raised by ask() when input ends in the middle of a menu step. */
export class EndOfInput extends Error {
  constructor() {
    super("input ended");
  }
}

export async function ask(io: MenuIO, query: string): Promise<string> {
  const answer = await io.question(query);
  if (answer === undefined) throw new EndOfInput();
  return answer;
}
