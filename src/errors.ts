/**
 * Base class for errors raised by the scene core.
 */
export class LightcasterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An object kind or action name the scene does not know how to create or apply.
 * Fatal to the requesting call only; the scene is left untouched.
 */
export class InvalidKindError extends LightcasterError {
  readonly kind: string;

  constructor(kind: string, expected: readonly string[]) {
    super(`Unknown kind "${kind}" (expected one of: ${expected.join(", ")})`);
    this.kind = kind;
  }
}

/**
 * A configuration value that violates a scene invariant.
 */
export class InvalidConfigError extends LightcasterError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid scene config "${field}": ${reason}`);
    this.field = field;
  }
}
