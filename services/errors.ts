export type AqiErrorKind = "InvalidInput" | "Upstream";

export class AqiError extends Error {
  constructor(
    readonly kind: AqiErrorKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A concentration that is present but cannot be used (negative, non-numeric). */
export class InvalidInputError extends AqiError {
  constructor(message: string) {
    super("InvalidInput", message);
  }
}

/** The air-quality provider was unreachable or answered with something unexpected. */
export class UpstreamError extends AqiError {
  constructor(message: string, options?: ErrorOptions) {
    super("Upstream", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
