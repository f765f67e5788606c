import { z } from 'zod';
import { isTransientProviderErrors, isTransientStatus } from './classify';
import { CONFIG } from './config';
import { HttpStatusError, ProviderError, ResponseParseError } from './errors';
import { fetchWithTimeout } from './net/http';
import { retryWithBackoff, RetryOptions } from './net/retry';
import type { DnsRecord, ProviderEnvelope, RecordUpdatePayload } from './types';

export interface CloudflareOptions {
  apiToken: string;
  zoneId: string;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
}

export interface CloudflareClient {
  /** A records whose name matches exactly. */
  listARecords(name: string): Promise<DnsRecord[]>;
  /** Rewrite `content`, echoing ttl and proxied back unchanged. */
  updateARecord(record: DnsRecord, content: string): Promise<DnsRecord>;
}

const ProviderApiErrorSchema = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
  })
  .passthrough();

const EnvelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(ProviderApiErrorSchema).default([]),
  messages: z.array(z.unknown()).default([]),
  result: z.unknown(),
});

// ttl and proxied are required: an update must never send them absent.
export const DnsRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  content: z.string(),
  type: z.literal('A'),
  proxied: z.boolean(),
  ttl: z.number().int().positive(),
});

function toRecord(r: z.infer<typeof DnsRecordSchema>): DnsRecord {
  return { id: r.id, name: r.name, content: r.content, type: r.type, proxied: r.proxied, ttl: r.ttl };
}

/**
 * Create a Cloudflare v4 client bound to one zone.
 * Every call goes through `retryWithBackoff`; the envelope decides
 * whether a failure is transient.
 */
export function createCloudflareClient(options: CloudflareOptions): CloudflareClient {
  const { apiToken, zoneId } = options;
  const baseUrl = (options.baseUrl ?? CONFIG.CLOUDFLARE_API_URL).replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? CONFIG.CLOUDFLARE_TIMEOUT_MS;

  if (!apiToken) throw new Error('Cloudflare: apiToken is required');
  if (!zoneId) throw new Error('Cloudflare: zoneId is required');

  async function cfFetch(path: string, init?: RequestInit): Promise<ProviderEnvelope<unknown>> {
    const url = `${baseUrl}${path}`;
    const headers = new Headers(init?.headers);
    headers.set('Authorization', `Bearer ${apiToken}`);
    headers.set('Content-Type', 'application/json');

    const res = await fetchWithTimeout(url, { ...init, headers }, { timeoutMs });

    let json: unknown;
    try {
      json = JSON.parse(res.body);
    } catch (err) {
      if (!res.ok) throw new HttpStatusError(url, res.status, res.body);
      throw new ResponseParseError(`Cloudflare: response from ${path} is not JSON`, { cause: err });
    }

    const parsed = EnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      if (!res.ok) throw new HttpStatusError(url, res.status, res.body);
      throw new ResponseParseError(`Cloudflare: unexpected response shape from ${path}`, {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    if (!data.success) {
      const transient = isTransientStatus(res.status) || isTransientProviderErrors(data.errors);
      throw new ProviderError('Cloudflare API error', data.errors, res.status, transient);
    }
    if (!res.ok) throw new HttpStatusError(url, res.status, res.body);

    return { success: data.success, errors: data.errors, messages: data.messages, result: data.result };
  }

  function call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, { label, ...options.retry });
  }

  return {
    listARecords(name: string): Promise<DnsRecord[]> {
      const path = `/zones/${encodeURIComponent(zoneId)}/dns_records?type=A&name=${encodeURIComponent(name)}`;
      return call('cloudflare:list', async () => {
        const data = await cfFetch(path);
        const records = z.array(DnsRecordSchema).safeParse(data.result);
        if (!records.success) {
          throw new ResponseParseError(`Cloudflare: malformed record list for ${name}`, {
            cause: records.error,
          });
        }
        return records.data.map(toRecord);
      });
    },

    updateARecord(record: DnsRecord, content: string): Promise<DnsRecord> {
      const path = `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(record.id)}`;
      const payload: RecordUpdatePayload = {
        type: 'A',
        name: record.name,
        content,
        ttl: record.ttl,
        proxied: record.proxied,
      };
      return call('cloudflare:update', async () => {
        const data = await cfFetch(path, { method: 'PUT', body: JSON.stringify(payload) });
        const updated = DnsRecordSchema.safeParse(data.result);
        if (!updated.success) {
          throw new ResponseParseError(`Cloudflare: malformed update result for ${record.name}`, {
            cause: updated.error,
          });
        }
        return toRecord(updated.data);
      });
    },
  };
}

export default createCloudflareClient;
