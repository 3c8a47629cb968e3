import { z } from 'zod';

/**
 * One row of the ASN listing, normalized
 */
export interface AsnRecord {
  /** ASN number without the `AS` prefix, e.g. "13335" */
  asnId: string;
  isActive: boolean;
  numberOfIpsAdvertised: number;
}

/**
 * Result of fetching one listing page. `end` means the listing has no more
 * data; failures are thrown instead so the builder can tell them apart.
 */
export type AsnPage = { kind: 'page'; page: number; records: AsnRecord[] } | { kind: 'end'; page: number };

/**
 * Remote source of ASN listings and per-ASN aggregated CIDR blocks
 */
export interface AsnSource {
  /**
   * @throws {RateLimitedError} When the listing stayed rate limited
   * @throws {UpstreamUnavailableError} On a non-200 response or network failure
   */
  listAsns(country: string, page: number): Promise<AsnPage>;

  /**
   * Returns the ASN's CIDR blocks, one per line, or null when the ASN has no
   * published data.
   */
  fetchAsnCidrBlock(asnId: string): Promise<string | null>;
}

/**
 * Raw listing row as served by the upstream JSON endpoint
 */
export const asnListingRowSchema = z
  .object({
    asn: z.union([z.string(), z.number()]).transform((value) => String(value)),
    type: z.string().optional(),
    numberOfIps: z.coerce.number().optional(),
  })
  .passthrough();
