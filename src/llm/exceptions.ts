export class ModelError extends Error {}

export class ModelProviderError extends ModelError {
  constructor(
    message: string,
    public statusCode = 502,
    public model: string | null = null
  ) {
    super(message);
    this.name = 'ModelProviderError';
  }
}

export class ModelRateLimitError extends ModelProviderError {
  constructor(message: string, statusCode = 429, model: string | null = null) {
    super(message, statusCode, model);
    this.name = 'ModelRateLimitError';
  }
}

export class ModelTimeoutError extends ModelProviderError {
  constructor(message: string, model: string | null = null) {
    super(message, 504, model);
    this.name = 'ModelTimeoutError';
  }
}

/** Timeouts, rate limits, connection failures and 5xx are worth another try. */
export const isTransientModelError = (error: unknown): boolean => {
  if (error instanceof ModelTimeoutError || error instanceof ModelRateLimitError) {
    return true;
  }
  return error instanceof ModelProviderError && error.statusCode >= 500;
};
