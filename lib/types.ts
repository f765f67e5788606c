export interface DnsRecord {
  id: string; // provider-assigned, stable
  name: string; // fully-qualified domain name
  content: string; // IPv4 currently stored
  type: 'A';
  proxied: boolean;
  ttl: number; // seconds, 1 = automatic
}

export interface ProviderApiError {
  code?: number;
  message?: string;
}

/** Envelope wrapping every Cloudflare v4 response. */
export interface ProviderEnvelope<T> {
  success: boolean;
  errors: ProviderApiError[];
  messages: unknown[];
  result: T;
}

/** Body of the record update call; ttl and proxied are echoed back unchanged. */
export interface RecordUpdatePayload {
  type: 'A';
  name: string;
  content: string;
  ttl: number;
  proxied: boolean;
}

export interface IpSource {
  name: string;
  url: string;
}

export type SourceOutcome =
  | { source: string; ok: true; ip: string }
  | { source: string; ok: false; error: Error };

export type DomainOutcome =
  | { domain: string; status: 'updated' | 'unchanged' }
  | { domain: string; status: 'failed'; error: string };

export interface CycleSummary {
  ok: boolean;
  ip: string | null;
  startedAt: string; // ISO timestamp
  durationMs: number;
  domains: DomainOutcome[];
  error?: string;
}
