import type { Animal, AnimalType } from './types';

abstract class BaseAnimal implements Animal {
  abstract readonly type: AnimalType;

  constructor(readonly name: string) {}

  display(): string {
    return `${this.type}: ${this.name}`;
  }

  info(): string {
    return `${this.type} named ${this.name}`;
  }

  abstract clone(): Animal;
}

export class Dog extends BaseAnimal {
  readonly type = 'Dog' as const;

  clone(): Dog {
    return new Dog(this.name);
  }
}

export class Cat extends BaseAnimal {
  readonly type = 'Cat' as const;

  clone(): Cat {
    return new Cat(this.name);
  }
}
