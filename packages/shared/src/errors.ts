export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class ConfigError extends Error {
  constructor(readonly keys: string[]) {
    super(`Missing or invalid configuration: ${keys.join(", ")}`);
    this.name = "ConfigError";
  }
}

export class UpstreamError extends Error {
  constructor(
    readonly service: string,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
