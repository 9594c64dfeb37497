export const INVALID_CODE_MESSAGE = 'NapTAN code must be an 8 digit number.';
export const UNABLE_TO_FETCH_MESSAGE = 'unable to fetch buses.';

export class NextBusError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NextBusError';
  }
}

export class ValidationError extends NextBusError {
  constructor(public readonly code: string) {
    super(INVALID_CODE_MESSAGE);
    this.name = 'ValidationError';
  }
}

/** The upstream page could not be reached at all. */
export class TransportError extends NextBusError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export class StatusError extends NextBusError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
  ) {
    super(`status != 200: status: ${status} ${statusText}`.trimEnd());
    this.name = 'StatusError';
  }
}

export class ParseError extends NextBusError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParseError';
  }
}
