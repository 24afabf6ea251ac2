/**
 * Thrown when a source or destination root cannot take part in a merge.
 */
export class InvalidRootError extends Error {
  constructor(
    public readonly root: string,
    reason: string
  ) {
    super(`Invalid root ${root}: ${reason}`);
    this.name = 'InvalidRootError';
  }
}

/**
 * Narrows an unknown thrown value to a Node.js system error carrying an errno code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errorCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
