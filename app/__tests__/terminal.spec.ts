import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { LineWriter } from '../../adapters/console';
import { Terminal, ask, EndOfInput } from '../terminal';
import { scripted } from './helpers';

describe('Terminal', () => {
  it('writes prompts, reads lines, and returns undefined at end of input', async () => {
    const out: string[] = [];
    const input = new PassThrough();
    const t = new Terminal(input, new LineWriter({ write: (c, cb) => { out.push(c); cb(); return true; } }));
    input.end('1\nhello world\n');
    expect(await t.question('Q1: ')).toBe('1');
    t.print('ok');
    expect(await t.question('Q2: ')).toBe('hello world');
    expect(await t.question('Q3: ')).toBeUndefined();
    await t.close();
    expect(out).toEqual(['Q1: ', 'ok\n', 'Q2: ', 'Q3: ']);
  });
});

describe('ask', () => {
  it('throws EndOfInput once answers run out', async () => {
    const { io } = scripted(['a']);
    expect(await ask(io, '? ')).toBe('a');
    await expect(ask(io, '? ')).rejects.toBeInstanceOf(EndOfInput);
  });
});
