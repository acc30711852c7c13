/**
 * Thrown when a caller hands the engine a request it cannot make sense of.
 * Ordinary run failures are never thrown; they end up in the execution state.
 */
export class InvalidRequestError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid build request: ${problems.join('; ')}`);
    this.name = 'InvalidRequestError';
    this.problems = problems;
  }
}

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class ProjectResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectResolutionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
