export class MalformedFrameError extends Error {
  constructor(
    message: string,
    readonly frame: string
  ) {
    super(message);
    this.name = "MalformedFrameError";
  }
}

export function createAbortError(message = "The operation was aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
