/** Archive content references something the catalogue does not have, or redefines a power. */
export class SchemaViolationError extends Error {
  section: string;

  constructor(section: string, message: string) {
    super(message);
    this.name = "SchemaViolationError";
    this.section = section;
  }
}

/** An operation was called before the state it needs exists. */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}
