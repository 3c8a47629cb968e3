import { createLogger, describeError, type Logger } from '../logger.js';
import { NotFoundError, UpstreamUnavailableError } from '../report/errors.js';
import { DEFAULT_RETRY_POLICY, discardBody, sleep, withRateLimitRetry, type RetryPolicy, type SleepFn } from './retry.js';
import { asnListingRowSchema, type AsnPage, type AsnRecord, type AsnSource } from './types.js';

/** Header/metadata lines at the top of every aggregated CIDR file */
export const CIDR_HEADER_LINES = 3;

export const DEFAULT_PAGE_SIZE = 20;

/** Default timeout for a single request (30 seconds) */
const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export interface HttpAsnSourceOptions {
  listingBaseUrl: string;
  cidrBaseUrl: string;
  pageSize?: number;
  requestTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Used for rate-limit backoff; injectable so tests don't wait */
  sleep?: SleepFn;
  logger?: Logger;
}

/**
 * Drops the header lines of an aggregated CIDR file and any blank lines,
 * leaving one CIDR block per entry.
 */
export function stripCidrHeader(text: string): string[] {
  return text
    .split(/\r?\n/)
    .slice(CIDR_HEADER_LINES)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Turns a listing response body into a page. Anything that is not a
 * non-empty array is the end of the listing; rows that fail validation are
 * skipped.
 */
export function parseAsnListing(body: unknown, page: number, logger?: Logger): AsnPage {
  if (!Array.isArray(body) || body.length === 0) {
    return { kind: 'end', page };
  }

  const records: AsnRecord[] = [];
  for (const row of body) {
    const parsed = asnListingRowSchema.safeParse(row);
    if (!parsed.success) {
      logger?.warn(`Skipping malformed listing row on page ${page}`, parsed.error.issues[0]?.message);
      continue;
    }

    records.push({
      asnId: parsed.data.asn.replace(/^AS/i, ''),
      isActive: parsed.data.type !== 'inactive',
      numberOfIpsAdvertised: parsed.data.numberOfIps ?? 0,
    });
  }

  return { kind: 'page', page, records };
}

/**
 * Inactive ASNs and ASNs advertising no addresses contribute nothing
 */
export function isUsableAsn(record: AsnRecord): boolean {
  return record.isActive && record.numberOfIpsAdvertised > 0;
}

/**
 * AsnSource over HTTP: a paginated JSON listing of ASNs per country and a
 * plain-text corpus of aggregated IPv4 blocks per ASN.
 */
export class HttpAsnSource implements AsnSource {
  private readonly pageSize: number;
  private readonly requestTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(private readonly options: HttpAsnSourceOptions) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('asn-source');
  }

  listingUrl(country: string, page: number): string {
    const url = new URL('/api/data/asns', this.options.listingBaseUrl);
    url.searchParams.set('country', country);
    url.searchParams.set('amount', String(this.pageSize));
    url.searchParams.set('page', String(page));
    return url.toString();
  }

  cidrUrl(asnId: string): string {
    const base = this.options.cidrBaseUrl.replace(/\/+$/, '');
    return `${base}/as/${encodeURIComponent(asnId)}/ipv4-aggregated.txt`;
  }

  async listAsns(country: string, page: number): Promise<AsnPage> {
    const url = this.listingUrl(country, page);
    const referer = new URL(`/countries/${country.toLowerCase()}`, this.options.listingBaseUrl).toString();

    const response = await withRateLimitRetry(
      () =>
        this.request(url, {
          accept: 'application/json',
          referer,
        }),
      {
        policy: this.retryPolicy,
        url,
        sleep: this.sleep,
        onRetry: (attempt, delayMs) => {
          this.logger.info(
            `Rate limited on page ${page} for ${country}. Retrying ${attempt}/${this.retryPolicy.maxAttempts - 1} in ${Math.ceil(delayMs / 1000)}s`
          );
        },
      }
    );

    if (response.status !== 200) {
      this.logger.warn(`Listing page ${page} for ${country} returned HTTP ${response.status}`);
      await discardBody(response);
      throw new UpstreamUnavailableError(url, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError(url, response.status, { cause: error });
    }

    const result = parseAsnListing(body, page, this.logger);
    if (result.kind === 'page') {
      this.logger.debug(`Page ${page}: ${result.records.length} ASNs listed for ${country}`);
    }
    return result;
  }

  async fetchAsnCidrBlock(asnId: string): Promise<string | null> {
    try {
      const lines = await this.requestCidrLines(asnId);
      return lines.length > 0 ? lines.join('\n') : null;
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.debug(error.message);
      } else {
        this.logger.warn(`Skipping AS${asnId}: ${describeError(error)}`);
      }
      return null;
    }
  }

  /**
   * @throws {NotFoundError} When the corpus has no file for the ASN
   * @throws {UpstreamUnavailableError} On any other failure
   */
  private async requestCidrLines(asnId: string): Promise<string[]> {
    const url = this.cidrUrl(asnId);
    const response = await this.request(url, { accept: 'text/plain' });

    if (response.status === 404) {
      await discardBody(response);
      throw new NotFoundError(asnId);
    }
    if (response.status !== 200) {
      await discardBody(response);
      throw new UpstreamUnavailableError(url, response.status);
    }

    try {
      return stripCidrHeader(await response.text());
    } catch (error) {
      throw new UpstreamUnavailableError(url, response.status, { cause: error });
    }
  }

  private async request(url: string, headers: Record<string, string>): Promise<Response> {
    try {
      return await fetch(url, {
        headers: {
          'user-agent': 'country-ip-ranges/1.0',
          ...headers,
        },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new UpstreamUnavailableError(url, null, { cause: error });
    }
  }
}
