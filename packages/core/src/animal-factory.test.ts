import { describe, it, expect } from 'vitest';
import { AnimalFactory, CatFactory, DogFactory } from './animal-factory';
import type { AnimalCreator } from './animal-factory';
import { Cat, Dog } from './animal';
import { UnknownAnimalTypeError } from './errors';

describe('AnimalFactory', () => {
  it('reported type matches the requested tag', () => {
    for (const tag of ['Dog', 'Cat']) {
      expect(AnimalFactory.createAnimal(tag, 'x').type).toBe(tag);
    }
  });

  it('unknown tag throws UnknownAnimalTypeError', () => {
    expect(() => AnimalFactory.createAnimal('Bird', 'Tweety')).toThrow(UnknownAnimalTypeError);
    expect(() => AnimalFactory.createAnimal('Bird', 'Tweety')).toThrow('Unknown animal type: Bird');
  });

  it('display and info lines', () => {
    const rex = AnimalFactory.createAnimal('Dog', 'Rex');
    expect(rex.display()).toBe('Dog: Rex');
    expect(rex.info()).toBe('Dog named Rex');
  });
});

describe('abstract factories', () => {
  it('each factory produces its fixed variant', () => {
    const creators: AnimalCreator[] = [new DogFactory(), new CatFactory()];
    const made = creators.map(f => f.createAnimal('Pat'));
    expect(made[0]).toBeInstanceOf(Dog);
    expect(made[1]).toBeInstanceOf(Cat);
    expect(made.map(a => a.display())).toEqual(['Dog: Pat', 'Cat: Pat']);
  });
});

describe('clone', () => {
  it('returns an independent copy with the same variant and name', () => {
    const tom = new Cat('Tom');
    const copy = tom.clone();
    expect(copy).not.toBe(tom);
    expect(copy).toBeInstanceOf(Cat);
    expect(copy.type).toBe('Cat');
    expect(copy.name).toBe('Tom');
  });
});
