import { fetchIpSource, FetchIpSourceOptions } from './fetchIpSource';
import type { IpSource } from '../types';

/**
 * AWS checkip answers with the address and a trailing newline.
 */
export const AMAZONAWS: IpSource = { name: 'amazonaws', url: 'https://checkip.amazonaws.com' };

export async function fetchAmazonAws(opts?: FetchIpSourceOptions): Promise<string> {
  return fetchIpSource(AMAZONAWS.url, AMAZONAWS.name, opts);
}

export default fetchAmazonAws;
