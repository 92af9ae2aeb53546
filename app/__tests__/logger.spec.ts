import { describe, it, expect } from 'vitest';
import { createLogger } from '../logger';

const capture = () => {
  const lines: string[] = [];
  return { lines, out: { error: (...args: unknown[]) => void lines.push(args.map(String).join(' ')) } };
};

describe('createLogger', () => {
  it('prefixes the component and filters below the level', () => {
    const { lines, out } = capture();
    const log = createLogger('registry', 'info', out);
    log.debug('hidden');
    log.info('closed');
    log.warn('slow');
    log.error('write failed', new Error('EPIPE'));
    expect(lines).toEqual(['[registry] closed', '[registry] warn: slow', '[registry] error: write failed: EPIPE']);
  });

  it('debug level shows everything', () => {
    const { lines, out } = capture();
    createLogger('catalog', 'debug', out).debug('input closed');
    expect(lines).toEqual(['[catalog] input closed']);
  });
});
