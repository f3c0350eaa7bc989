/**
 * Raised when a custom window cannot be resolved (start after end, bad dates).
 * This is the only engine error surfaced to the user.
 */
export class InvalidWindowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidWindowError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
