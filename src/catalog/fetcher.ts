import { request, type Dispatcher } from 'undici';
import { FetchError } from '../errors.js';
import { providerOf, type Catalog, type Item } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { catalogResponseSchema, describeIssues, type ModelRecord } from './schema.js';

export interface FetchCatalogOptions {
  url: string;
  /** Sent as a bearer token when set. */
  apiKey?: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'model-price-watch/1.0',
  Accept: 'application/json',
};

export function toItem(record: ModelRecord): Item {
  return {
    id: record.id,
    name: record.name || record.id,
    provider: providerOf(record.id),
    inputPrice: record.pricing.prompt,
    outputPrice: record.pricing.completion,
    contextLength: record.context_length ?? record.max_tokens ?? 0,
  };
}

/**
 * Downloads the full model catalog. Any transport, status or payload problem
 * surfaces as a FetchError; nothing is retried.
 */
export async function fetchCatalog(options: FetchCatalogOptions): Promise<Catalog> {
  const { url, apiKey, timeoutMs, dispatcher } = options;
  const log = logger.child({ url });

  const headers = apiKey ? { ...DEFAULT_HEADERS, Authorization: `Bearer ${apiKey}` } : DEFAULT_HEADERS;

  let statusCode: number;
  let payload: unknown;
  try {
    const res = await request(url, {
      method: 'GET',
      headers,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      dispatcher,
    });
    statusCode = res.statusCode;
    if (statusCode < 200 || statusCode >= 300) {
      const text = await res.body.text();
      throw new FetchError(`Catalog request returned HTTP ${statusCode}: ${text.slice(0, 200)}`, {
        status: statusCode,
      });
    }
    payload = await res.body.json();
  } catch (err) {
    if (err instanceof FetchError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Catalog request failed: ${reason}`, { cause: err });
  }

  const parsed = catalogResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new FetchError(`Malformed catalog payload: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const catalog = new Map<string, Item>();
  for (const record of parsed.data.data) {
    if (catalog.has(record.id)) {
      throw new FetchError(`Duplicate model id in catalog: ${record.id}`);
    }
    catalog.set(record.id, toItem(record));
  }

  log.debug({ status: statusCode, count: catalog.size }, 'Catalog fetched');
  return catalog;
}
