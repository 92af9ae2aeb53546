import type { Item, Member } from './types';
import { describeItem, describeMember, member as copyMember } from './item';

/**
 * Aggregate of catalog items and members, both kept in insertion order.
 * There is no removal or lookup.
 */
export class Catalog {
  private readonly itemList: Item[] = [];
  private readonly memberList: Member[] = [];

  addItem(item: Item): void {
    this.itemList.push(item);
  }

  /** Members are stored by value. */
  addMember(m: Member): void {
    this.memberList.push(copyMember(m.name));
  }

  *displayItems(): Generator<string, void, undefined> {
    for (const item of this.itemList) yield describeItem(item);
  }

  *displayMembers(): Generator<string, void, undefined> {
    for (const m of this.memberList) yield describeMember(m);
  }

  items(): readonly Item[] {
    return this.itemList;
  }

  members(): readonly Member[] {
    return this.memberList;
  }
}

let shared: Catalog | undefined;

/** Lazily created process-wide catalog, for callers that want one global instance. */
export function defaultCatalog(): Catalog {
  return (shared ??= new Catalog());
}

/** Drop the process-wide catalog; the next defaultCatalog() call builds a fresh one. */
export function resetDefaultCatalog(): void {
  shared = undefined;
}
