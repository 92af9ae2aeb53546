import type { Animal, Observer } from './types';

/**
 * Broadcasts animals to observers synchronously, in registration order.
 * The same observer may be registered more than once.
 */
export class Notifier {
  private readonly observers: Observer[] = [];

  addObserver(o: Observer): void {
    this.observers.push(o);
  }

  /** Remove the earliest registration of `o`. Returns false if it was not registered. */
  removeObserver(o: Observer): boolean {
    const i = this.observers.indexOf(o);
    if (i < 0) return false;
    this.observers.splice(i, 1);
    return true;
  }

  notify(animal: Animal): void {
    for (const o of [...this.observers]) o.update(animal);
  }

  size(): number {
    return this.observers.length;
  }
}
