/**
 * Catalog Domain Errors
 *
 * Thrown by the pure domain functions. The server maps them onto its own
 * HTTP-aware error classes where they cross a route boundary.
 */

/**
 * Image payload is neither hex-encoded binary nor base64
 *
 * @example
 * throw new DecodeError('Payload is not hex or base64', 'zz-not-an-image');
 */
export class DecodeError extends Error {
  readonly name = 'DecodeError' as const;
  /** First characters of the rejected payload, for logs */
  readonly sample: string;

  constructor(message: string, payload = '') {
    super(message);
    this.sample = payload.slice(0, 32);
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * A numeric source column could not be read as a decimal
 */
export class InvalidNumberError extends Error {
  readonly name = 'InvalidNumberError' as const;
  readonly value: string;

  constructor(value: string) {
    super(`Not a number: "${value}"`);
    this.value = value;
    Object.setPrototypeOf(this, InvalidNumberError.prototype);
  }
}

/**
 * A change-set item was moved through the scheduler state machine illegally
 */
export class InvalidItemTransitionError extends Error {
  readonly name = 'InvalidItemTransitionError' as const;
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid item transition: ${from} → ${to}`);
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, InvalidItemTransitionError.prototype);
  }
}
