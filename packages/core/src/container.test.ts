import { describe, it, expect } from 'vitest';
import { Container } from './container';

describe('Container', () => {
  it('sorts numbers numerically by default', () => {
    const c = new Container<number>();
    for (const n of [10, 2, 33, 1]) c.add(n);
    c.sort();
    expect([...c.display()]).toEqual(['1', '2', '10', '33']);
  });

  it('sorts strings by code unit', () => {
    const c = new Container<string>();
    for (const s of ['pear', 'Apple', 'apple']) c.add(s);
    c.sort();
    expect(c.toArray()).toEqual(['Apple', 'apple', 'pear']);
  });

  it('custom comparator sort is stable', () => {
    const c = new Container<{ k: number; v: string }>();
    c.add({ k: 2, v: 'a' });
    c.add({ k: 1, v: 'b' });
    c.add({ k: 2, v: 'c' });
    c.add({ k: 1, v: 'd' });
    c.sort((x, y) => x.k - y.k);
    expect(c.toArray().map(x => x.v)).toEqual(['b', 'd', 'a', 'c']);
  });

  it('toArray returns a copy', () => {
    const c = new Container<number>();
    c.add(1);
    c.toArray().push(2);
    expect(c.toArray()).toEqual([1]);
  });
});
