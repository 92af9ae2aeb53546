import type { Animal } from './types';

let live = 0;

const byType = (a: Animal, b: Animal): number => (a.type < b.type ? -1 : a.type > b.type ? 1 : 0);

/**
 * Ordered collection of shared animal references.
 * Each open registry counts toward instanceCount() until close() is called.
 */
export class AnimalRegistry {
  private list: Animal[] = [];
  private closed = false;

  constructor() {
    live++;
  }

  /** Number of registries constructed and not yet closed. Diagnostic only. */
  static instanceCount(): number {
    return live;
  }

  add(animal: Animal): void {
    this.list.push(animal);
  }

  *displayAll(): Generator<string, void, undefined> {
    for (const a of this.list) yield a.display();
  }

  /** Remove every animal whose tag equals `type`. Returns how many were removed. */
  removeByType(type: string): number {
    const before = this.list.length;
    this.list = this.list.filter(a => a.type !== type);
    return before - this.list.length;
  }

  *displayInfoByType(type: string): Generator<string, void, undefined> {
    for (const a of this.list) {
      if (a.type === type) yield a.info();
    }
  }

  /** Stable ascending sort by tag; equal tags keep their relative order. */
  sortByType(): void {
    this.list.sort(byType);
  }

  animals(): readonly Animal[] {
    return this.list;
  }

  /** Release this registry's slot in the live count. Later calls do nothing. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    live--;
  }
}
