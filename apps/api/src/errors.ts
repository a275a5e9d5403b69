export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Malformed caller input: a target property missing price/address, bad mortgage terms. */
export class InvalidInputError extends AppError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('INVALID_INPUT', 400, message);
    this.field = field;
  }
}

export type ProviderName = 'zillow' | 'mashvisor' | 'serpapi';

export class ProviderUnavailableError extends AppError {
  readonly provider: ProviderName;
  readonly upstreamStatus?: number;

  constructor(provider: ProviderName, message: string, options?: { upstreamStatus?: number; cause?: unknown }) {
    super('PROVIDER_UNAVAILABLE', 502, message);
    this.provider = provider;
    this.upstreamStatus = options?.upstreamStatus;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}
