export const CREDENTIAL_ERROR_MESSAGE = "Couldn't resolve PAGE_ACCESS_TOKEN. "
  + 'Define this var in your settings configuration or as environment variable.';

export const MISSING_PAYMENT_PARAMETER = 'At least one parameter should be set';

/**
 * Raised when the client cannot be configured: no access token in any source,
 * or an environment value that fails validation. Always thrown before a
 * request is attempted.
 */
export class ConfigurationError extends Error {
  constructor(message: string = CREDENTIAL_ERROR_MESSAGE) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Local error value returned in place of a `Response` when a guarded call has nothing to send. */
export interface MissingParameterError {
  Error: typeof MISSING_PAYMENT_PARAMETER;
}

export function missingParameterError(): MissingParameterError {
  return { Error: MISSING_PAYMENT_PARAMETER };
}

export function isMissingParameterError(value: unknown): value is MissingParameterError {
  if (!value || typeof value !== 'object' || value instanceof Response) return false;
  return 'Error' in value && value.Error === MISSING_PAYMENT_PARAMETER;
}
