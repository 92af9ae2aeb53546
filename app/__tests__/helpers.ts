import { createLogger } from '../logger';
import type { MenuIO } from '../terminal';

/** MenuIO that answers from a fixed list and records everything shown. */
export function scripted(answers: string[]): { io: MenuIO; transcript: string[] } {
  const transcript: string[] = [];
  const queue = [...answers];
  const io: MenuIO = {
    print: line => {
      transcript.push(line);
    },
    question: async query => {
      transcript.push(query);
      return queue.shift();
    },
  };
  return { io, transcript };
}

export const quietLogger = () => createLogger('test', 'error', { error: () => undefined });
