import { fetchIpSource, FetchIpSourceOptions } from './fetchIpSource';
import type { IpSource } from '../types';

/**
 * ipify: plain-text IPv4 echo, no auth.
 */
export const IPIFY: IpSource = { name: 'ipify', url: 'https://api.ipify.org' };

export async function fetchIpify(opts?: FetchIpSourceOptions): Promise<string> {
  return fetchIpSource(IPIFY.url, IPIFY.name, opts);
}

export default fetchIpify;
