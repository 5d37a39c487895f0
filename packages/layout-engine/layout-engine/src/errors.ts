export type LayoutContractErrorCode = 'INVALID_CONFIG' | 'NON_POSITIVE_CONTENT_AREA' | 'NON_POSITIVE_COLUMN_WIDTH';

/**
 * Thrown when configuration would produce nonsensical geometry.
 *
 * This is the only failure the engine raises; every content anomaly is
 * recovered by defaulting. Consumers should prefer checking `error.code` over
 * `instanceof` across package boundaries.
 */
export class LayoutContractError extends Error {
  readonly code: LayoutContractErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LayoutContractErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LayoutContractError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, LayoutContractError.prototype);
  }
}
