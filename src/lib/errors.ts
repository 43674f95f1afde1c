// Thrown before any computation when a request cannot be interpreted
// (bad calendar date, radius out of range, unknown rule or term).
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
