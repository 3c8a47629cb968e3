/**
 * Failure taxonomy for the report pipeline. Every failure a caller can
 * observe is a ReportError carrying a `kind` discriminant; user-facing text
 * is the caller's job.
 */
export type ReportErrorKind =
  | 'RateLimited'
  | 'UpstreamUnavailable'
  | 'NotFound'
  | 'InvalidCountry'
  | 'AlreadyBuilding'
  | 'PersistenceFailure'
  | 'Unexpected';

export class ReportError extends Error {
  constructor(
    public readonly kind: ReportErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReportError';
    Object.setPrototypeOf(this, ReportError.prototype);
  }
}

/**
 * Listing endpoint kept answering 429 after the retry budget ran out
 */
export class RateLimitedError extends ReportError {
  constructor(
    public readonly url: string,
    public readonly attempts: number
  ) {
    super('RateLimited', `Rate limited by ${url} after ${attempts} attempts`);
    this.name = 'RateLimitedError';
    Object.setPrototypeOf(this, RateLimitedError.prototype);
  }
}

export class UpstreamUnavailableError extends ReportError {
  constructor(
    public readonly url: string,
    public readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(
      'UpstreamUnavailable',
      status === null
        ? `Request to ${url} failed before a response was received`
        : `Request to ${url} returned HTTP ${status}`,
      options
    );
    this.name = 'UpstreamUnavailableError';
    Object.setPrototypeOf(this, UpstreamUnavailableError.prototype);
  }
}

/**
 * The CIDR corpus has no published data for an ASN
 */
export class NotFoundError extends ReportError {
  constructor(public readonly asnId: string) {
    super('NotFound', `No aggregated CIDR data published for AS${asnId}`);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InvalidCountryError extends ReportError {
  constructor(
    public readonly country: string,
    options?: { cause?: unknown }
  ) {
    super('InvalidCountry', `No IP ranges could be assembled for country "${country}"`, options);
    this.name = 'InvalidCountryError';
    Object.setPrototypeOf(this, InvalidCountryError.prototype);
  }
}

export class AlreadyBuildingError extends ReportError {
  constructor(
    public readonly country: string,
    public readonly date: string
  ) {
    super('AlreadyBuilding', `A report for ${country} on ${date} is already being built`);
    this.name = 'AlreadyBuildingError';
    Object.setPrototypeOf(this, AlreadyBuildingError.prototype);
  }
}

export class PersistenceFailureError extends ReportError {
  constructor(
    public readonly operation: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('PersistenceFailure', `Failed to ${operation} ${path}${reason}`, options);
    this.name = 'PersistenceFailureError';
    Object.setPrototypeOf(this, PersistenceFailureError.prototype);
  }
}

export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}

/**
 * Normalizes anything thrown inside a build into a ReportError
 */
export function toReportError(error: unknown): ReportError {
  if (isReportError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ReportError('Unexpected', `Report build failed: ${message}`, { cause: error });
}
