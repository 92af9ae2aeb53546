export type {
  Book,
  Magazine,
  Item,
  ItemType,
  Member,
  Animal,
  AnimalType,
  Observer,
} from './types';
export {
  DemoError,
  UnknownItemTypeError,
  UnknownAnimalTypeError,
  ParseError,
  IssueNumberParseError,
} from './errors';
export { book, magazine, member, createItem, parseIssueNumber, describeItem, describeMember } from './item';
export { Catalog, defaultCatalog, resetDefaultCatalog } from './catalog';
export { Dog, Cat } from './animal';
export { AnimalFactory, DogFactory, CatFactory } from './animal-factory';
export type { AnimalCreator } from './animal-factory';
export { AnimalRegistry } from './registry';
export { Notifier } from './notifier';
export { Container } from './container';
export type { Compare } from './container';
