import Axios from 'axios';
import { Readable } from 'stream';
import { FetchTimeout, UserAgent } from '../config';
import { StreamSource } from './reader';

export function isUrl(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

export async function openUrl(url: string | URL): Promise<StreamSource> {
  const resp = await Axios.get<Readable>(url.toString(), {
    responseType: 'stream',
    timeout: FetchTimeout,
    headers: { 'User-Agent': UserAgent },
  });
  return new StreamSource(resp.data);
}
