import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { DEFAULT_HTTP_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../constants';
import { TileServiceError, TileTransportError } from '../utils/errors';

export type TileResponse =
  | { status: 'found'; body: Buffer }
  | { status: 'not-found' };

/**
 * Transport boundary for tile downloads. Only "tile absent" is a normal
 * outcome; every other failure must be thrown.
 */
export interface TileFetcher {
  fetchTile(url: string): Promise<TileResponse>;
}

export interface AxiosTileFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  client?: AxiosInstance;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'binary');
  }
  return Buffer.alloc(0);
}

export class AxiosTileFetcher implements TileFetcher {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: AxiosTileFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.client = options.client ?? axios.create();
  }

  async fetchTile(url: string): Promise<TileResponse> {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgent },
        // Status codes are classified below rather than thrown by axios
        validateStatus: () => true
      });
    } catch (error) {
      throw new TileTransportError(url, error);
    }

    if (response.status === 404) {
      return { status: 'not-found' };
    }
    if (response.status < 200 || response.status >= 300) {
      throw new TileServiceError(url, response.status);
    }
    return { status: 'found', body: toBuffer(response.data) };
  }
}
