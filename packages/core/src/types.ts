/**
 * Catalog item variants. The `type` tag is fixed when the value is built.
 */
export type Book = { readonly type: 'Book'; readonly title: string; readonly author: string };
export type Magazine = { readonly type: 'Magazine'; readonly title: string; readonly issueNumber: number };

/**
 * Union of all catalog item variants.
 */
export type Item = Book | Magazine;

export type ItemType = Item['type'];

/**
 * Catalog member, stored by value.
 */
export type Member = { readonly name: string };

export type AnimalType = 'Dog' | 'Cat';

/**
 * Registry entry. Implementations keep their variant tag for life.
 */
export interface Animal {
  readonly type: AnimalType;
  readonly name: string;
  /** One-line display form, e.g. `Dog: Rex`. */
  display(): string;
  /** One-line info form, e.g. `Dog named Rex`. */
  info(): string;
  /** Independent copy with the same variant and name. */
  clone(): Animal;
}

/**
 * Receives animals broadcast by a Notifier.
 */
export interface Observer {
  update(animal: Animal): void;
}
