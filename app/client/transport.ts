import type { EdrRequest } from '../queries/request';

export interface TransportResponse {
  status: number;
  // media type of the body, with its parameters, e.g. `application/json; charset=utf-8`
  contentType?: string;
  // header names in lower case
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Sends requests to EDR services. Retries, timeouts and cancellation are the transport's
 * concern; a request that cannot be completed rejects with a `TransportError`. Responses with
 * any HTTP status resolve.
 */
export interface Transport {
  send(request: EdrRequest): Promise<TransportResponse>;
}

/**
 * Supplies the authentication headers of a server, e.g. `Authorization`
 */
export interface CredentialsProvider {
  authHeaders(serverUrl: string): Record<string, string> | Promise<Record<string, string>>;
}
