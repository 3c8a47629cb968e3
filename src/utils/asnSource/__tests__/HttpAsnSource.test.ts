import { describe, it, expect, vi, beforeEach } from 'vitest';
import { silentLogger, type Logger } from '../../logger.js';
import { RateLimitedError, UpstreamUnavailableError } from '../../report/errors.js';
import { HttpAsnSource, isUsableAsn, parseAsnListing, stripCidrHeader } from '../HttpAsnSource.js';

const CIDR_FILE = ['# AS3320', '# aggregated IPv4', '# generated daily', '10.1.0.0/16', '', '10.2.0.0/24', ''].join('\n');

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('stripCidrHeader', () => {
  it('drops the three header lines and blank lines', () => {
    expect(stripCidrHeader(CIDR_FILE)).toEqual(['10.1.0.0/16', '10.2.0.0/24']);
  });

  it('handles CRLF line endings', () => {
    expect(stripCidrHeader('a\r\nb\r\nc\r\n10.0.0.0/8\r\n')).toEqual(['10.0.0.0/8']);
  });

  it('returns nothing for a header-only file', () => {
    expect(stripCidrHeader('a\nb\nc\n')).toEqual([]);
  });
});

describe('parseAsnListing', () => {
  it('normalizes rows and strips the AS prefix', () => {
    const page = parseAsnListing(
      [
        { asn: 'AS3320', type: 'isp', numberOfIps: 1000 },
        { asn: 'as64500', type: 'inactive', numberOfIps: 256 },
        { asn: 64501, type: 'hosting', numberOfIps: '0' },
        { asn: 'AS64502' },
      ],
      4
    );

    expect(page).toEqual({
      kind: 'page',
      page: 4,
      records: [
        { asnId: '3320', isActive: true, numberOfIpsAdvertised: 1000 },
        { asnId: '64500', isActive: false, numberOfIpsAdvertised: 256 },
        { asnId: '64501', isActive: true, numberOfIpsAdvertised: 0 },
        { asnId: '64502', isActive: true, numberOfIpsAdvertised: 0 },
      ],
    });
  });

  it('treats an empty array, null or an object as the end of the listing', () => {
    expect(parseAsnListing([], 2)).toEqual({ kind: 'end', page: 2 });
    expect(parseAsnListing(null, 2)).toEqual({ kind: 'end', page: 2 });
    expect(parseAsnListing({ error: 'bad country' }, 2)).toEqual({ kind: 'end', page: 2 });
  });

  it('skips malformed rows with a warning', () => {
    const logger: Logger = { ...silentLogger, warn: vi.fn() };

    const page = parseAsnListing([{ type: 'isp' }, { asn: 'AS1' }], 1, logger);

    expect(page).toEqual({
      kind: 'page',
      page: 1,
      records: [{ asnId: '1', isActive: true, numberOfIpsAdvertised: 0 }],
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('isUsableAsn', () => {
  it('keeps only active ASNs that advertise addresses', () => {
    expect(isUsableAsn({ asnId: '1', isActive: true, numberOfIpsAdvertised: 1 })).toBe(true);
    expect(isUsableAsn({ asnId: '2', isActive: false, numberOfIpsAdvertised: 512 })).toBe(false);
    expect(isUsableAsn({ asnId: '3', isActive: true, numberOfIpsAdvertised: 0 })).toBe(false);
  });
});

describe('HttpAsnSource', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const sleepMock = vi.fn(async (_ms: number) => undefined);
  let logger: Logger;
  let source: HttpAsnSource;

  beforeEach(() => {
    fetchMock.mockReset();
    sleepMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
    logger = { ...silentLogger, warn: vi.fn(), debug: vi.fn() };
    source = new HttpAsnSource({
      listingBaseUrl: 'https://listing.test',
      cidrBaseUrl: 'https://cidr.test/corpus/',
      sleep: sleepMock,
      logger,
    });
  });

  it('builds listing and CIDR URLs', () => {
    expect(source.listingUrl('DE', 2)).toBe('https://listing.test/api/data/asns?country=DE&amount=20&page=2');
    expect(source.cidrUrl('13335')).toBe('https://cidr.test/corpus/as/13335/ipv4-aggregated.txt');
  });

  it('fetches and parses a listing page', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ asn: 'AS3320', type: 'isp', numberOfIps: 1000 }]));

    const page = await source.listAsns('DE', 1);

    expect(page).toEqual({
      kind: 'page',
      page: 1,
      records: [{ asnId: '3320', isActive: true, numberOfIpsAdvertised: 1000 }],
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://listing.test/api/data/asns?country=DE&amount=20&page=1');
    expect(init?.headers).toMatchObject({
      accept: 'application/json',
      referer: 'https://listing.test/countries/de',
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('reports the end of the listing for an empty page', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await expect(source.listAsns('DE', 3)).resolves.toEqual({ kind: 'end', page: 3 });
  });

  it('retries rate-limited listing requests', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 429 }))
      .mockResolvedValueOnce(new Response(null, { status: 429 }))
      .mockResolvedValueOnce(jsonResponse([{ asn: 'AS1', numberOfIps: 10 }]));

    const page = await source.listAsns('DE', 1);

    expect(page.kind).toBe('page');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleepMock.mock.calls.map(([ms]) => ms)).toEqual([5000, 5000]);
  });

  it('fails with RateLimitedError after three rate-limited attempts', async () => {
    fetchMock.mockImplementation(async () => new Response(null, { status: 429 }));

    await expect(source.listAsns('DE', 1)).rejects.toBeInstanceOf(RateLimitedError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('fails with UpstreamUnavailableError on other statuses', async () => {
    fetchMock.mockResolvedValueOnce(new Response('oops', { status: 502 }));

    await expect(source.listAsns('DE', 1)).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      status: 502,
    });
  });

  it('releases the body of a failed listing response', async () => {
    const failed = new Response('oops', { status: 502 });
    fetchMock.mockResolvedValueOnce(failed);

    await expect(source.listAsns('DE', 1)).rejects.toBeInstanceOf(UpstreamUnavailableError);
    expect(failed.bodyUsed).toBe(true);
  });

  it('fails with UpstreamUnavailableError when the request never completes', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const attempt = source.listAsns('DE', 1);

    await expect(attempt).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(attempt).rejects.toMatchObject({ status: null });
  });

  it('fails with UpstreamUnavailableError on a body that is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    await expect(source.listAsns('DE', 1)).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it('returns the CIDR blocks of an ASN without the header', async () => {
    fetchMock.mockResolvedValueOnce(new Response(CIDR_FILE, { status: 200 }));

    await expect(source.fetchAsnCidrBlock('3320')).resolves.toBe('10.1.0.0/16\n10.2.0.0/24');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://cidr.test/corpus/as/3320/ipv4-aggregated.txt');
  });

  it('returns null for an ASN without published data', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Not Found', { status: 404 }));

    await expect(source.fetchAsnCidrBlock('64512')).resolves.toBeNull();
    expect(logger.debug).toHaveBeenCalledWith('No aggregated CIDR data published for AS64512');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('releases the body of missing and failed CIDR responses', async () => {
    const missing = new Response('Not Found', { status: 404 });
    const failed = new Response('busy', { status: 503 });
    fetchMock.mockResolvedValueOnce(missing).mockResolvedValueOnce(failed);

    await source.fetchAsnCidrBlock('64512');
    await source.fetchAsnCidrBlock('3320');

    expect(missing.bodyUsed).toBe(true);
    expect(failed.bodyUsed).toBe(true);
  });

  it('returns null with a warning when the corpus fails', async () => {
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));

    await expect(source.fetchAsnCidrBlock('3320')).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping AS3320: Request to https://cidr.test/corpus/as/3320/ipv4-aggregated.txt returned HTTP 503'
    );
  });

  it('returns null for a file with only header lines', async () => {
    fetchMock.mockResolvedValueOnce(new Response('# a\n# b\n# c\n', { status: 200 }));

    await expect(source.fetchAsnCidrBlock('3320')).resolves.toBeNull();
  });
});
