import { CONFIG } from '../config';
import { incTransportError, observePage } from '../metrics';
import { TransportError } from '../errors';
import logger from '../logger';
import type { DnsRecord } from '../types';
import type { HttpTransport } from '../net/httpTransport';
import { parsePage, returnFieldsFor } from './schema';

export interface RecordFetcherOptions {
  baseUrl: string; // e.g. https://grid.example.net/wapi/v2.13.1
  pageSize?: number;
}

/**
 * Build the WAPI base URL for a grid master.
 */
export function wapiBaseUrl(gridHost: string, version: string = CONFIG.WAPI.VERSION): string {
  const host = gridHost.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  return `https://${host}/wapi/v${version}`;
}

/**
 * Cursor-paginated record retrieval.
 *
 * Pages of one record type are requested strictly one after another, since each request echoes
 * the `next_page_id` of the previous response. Different record types may be fetched
 * concurrently; their page requests compete for the transport's shared slots.
 */
export class RecordFetcher {
  private readonly baseUrl: string;
  private readonly pageSize: number;

  constructor(private readonly transport: HttpTransport, opts: RecordFetcherOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.pageSize = opts.pageSize ?? CONFIG.WAPI.PAGE_SIZE;
  }

  /** URL of one page request; `pageId` is omitted on the first page. */
  pageUrl(recordType: string, pageId?: string): string {
    const params = new URLSearchParams({
      _return_fields: returnFieldsFor(recordType),
      _paging: '1',
      _max_results: String(this.pageSize),
      _return_as_object: '1',
    });
    if (pageId) params.set('_page_id', pageId);
    return `${this.baseUrl}/${recordType}?${params.toString()}`;
  }

  async fetch(recordType: string): Promise<DnsRecord[]> {
    const records: DnsRecord[] = [];
    let pageId: string | undefined;
    let pages = 0;

    // Validates the record type before any request goes out.
    let url = this.pageUrl(recordType);
    for (;;) {
      const body = await this.transport.getJson(url);
      const parsed = parsePage(body, recordType);
      if (!parsed.success) {
        logger.debug({ url, recordType, error: parsed.error }, 'wapi page failed validation');
        incTransportError('payload');
        throw new TransportError(`Malformed ${recordType} page from ${url}: ${parsed.error}`, {
          url,
          reason: 'payload',
        });
      }

      pages++;
      records.push(...parsed.page.records);
      observePage(recordType, parsed.page.records.length);
      logger.debug({ recordType, page: pages, count: parsed.page.records.length }, 'wapi page received');

      pageId = parsed.page.nextPageId;
      if (!pageId) break;
      url = this.pageUrl(recordType, pageId);
    }

    logger.debug({ recordType, pages, total: records.length }, 'wapi fetch complete');
    return records;
  }
}

export default RecordFetcher;
