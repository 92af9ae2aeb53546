import type { Animal } from './types';
import { Cat, Dog } from './animal';
import { UnknownAnimalTypeError } from './errors';

/**
 * Static dispatch on the variant tag. Tags are matched as spelled: "Dog", "Cat".
 */
export const AnimalFactory = {
  createAnimal(type: string, name: string): Animal {
    switch (type) {
      case 'Dog':
        return new Dog(name);
      case 'Cat':
        return new Cat(name);
      default:
        throw new UnknownAnimalTypeError(type);
    }
  },
} as const;

/** Abstract factory: each implementation produces one fixed variant. */
export interface AnimalCreator {
  createAnimal(name: string): Animal;
}

export class DogFactory implements AnimalCreator {
  createAnimal(name: string): Dog {
    return new Dog(name);
  }
}

export class CatFactory implements AnimalCreator {
  createAnimal(name: string): Cat {
    return new Cat(name);
  }
}
