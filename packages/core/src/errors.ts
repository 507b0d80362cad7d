/**
 * Raised for bad input (command arguments, intervals, increments).
 * Never raised for rejected events; those are routine outcomes.
 */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}
