import { fetchIpSource, FetchIpSourceOptions } from './fetchIpSource';
import type { IpSource } from '../types';

// The ipv4. host never answers with an IPv6 address.
export const ICANHAZIP: IpSource = { name: 'icanhazip', url: 'https://ipv4.icanhazip.com' };

export async function fetchIcanhazip(opts?: FetchIpSourceOptions): Promise<string> {
  return fetchIpSource(ICANHAZIP.url, ICANHAZIP.name, opts);
}

export default fetchIcanhazip;
