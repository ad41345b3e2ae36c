import axios, { type AxiosInstance } from 'axios';
import type { EdrRequest } from '../queries/request';
import env from '../util/env';
import { TransportError } from '../util/errors';
import type { Transport, TransportResponse } from './transport';

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  if (data === undefined || data === null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), 'utf8');
}

function headerRecord(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

/**
 * Transport backed by axios. Every HTTP status resolves so that the client decides what a
 * failure is; network errors and timeouts reject with a `TransportError`.
 */
export default class AxiosTransport implements Transport {
  instance: AxiosInstance;

  timeout: number;

  constructor(instance: AxiosInstance = axios, timeout = env.requestTimeoutMs) {
    this.instance = instance;
    this.timeout = timeout;
  }

  async send(request: EdrRequest): Promise<TransportResponse> {
    try {
      const response = await this.instance.request<unknown>({
        method: request.method,
        url: request.url,
        headers: { 'User-Agent': env.userAgent, ...request.headers },
        data: request.body,
        responseType: 'arraybuffer',
        timeout: this.timeout,
        validateStatus: () => true,
      });
      const headers = headerRecord(response.headers);
      const result: TransportResponse = { status: response.status, headers, body: toBuffer(response.data) };
      if (headers['content-type'] !== undefined) result.contentType = headers['content-type'];
      return result;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(`${request.method} ${request.url} failed: ${message}`, e);
    }
  }
}
