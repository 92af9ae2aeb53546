/** Base for errors raised on bad user input. Menu loops recover from these. */
export class DemoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownItemTypeError extends DemoError {
  constructor(readonly itemType: string) {
    super('Unknown library item type');
  }
}

export class UnknownAnimalTypeError extends DemoError {
  constructor(readonly animalType: string) {
    super(`Unknown animal type: ${animalType}`);
  }
}

/** Raised when text does not parse as the expected number. */
export class ParseError extends DemoError {
  constructor(
    message: string,
    readonly input: string,
  ) {
    super(message);
  }
}

export class IssueNumberParseError extends ParseError {
  constructor(input: string) {
    super(`Invalid issue number: "${input}"`, input);
  }
}
