// packages/engine/src/errors.ts

/**
 * Thrown when a caller passes money, a rate or a horizon outside the domain
 * a model accepts. Values are never clamped.
 */
export class InvalidArgumentError extends Error {
  readonly argument: string;
  constructor(argument: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}
