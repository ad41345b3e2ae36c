import type { RecordStore } from '../../app/models/saved-query-catalog';
import type { EdrRequest } from '../../app/queries/request';
import type { Transport, TransportResponse } from '../../app/client/transport';

/**
 * Record store kept in memory, in insertion order
 */
export class MemoryRecordStore implements RecordStore {
  blobs: Map<string, string> = new Map();

  async get(id: string): Promise<string | undefined> {
    return this.blobs.get(id);
  }

  async put(id: string, blob: string): Promise<void> {
    this.blobs.set(id, blob);
  }

  async delete(id: string): Promise<void> {
    this.blobs.delete(id);
  }

  async list(): Promise<string[]> {
    return [...this.blobs.keys()];
  }
}

export interface StubResponse {
  status?: number;
  contentType?: string;
  headers?: Record<string, string>;
  body: string | object;
}

/**
 * Transport answering from a table of responses keyed by URL, recording every request
 */
export class StubTransport implements Transport {
  requests: EdrRequest[] = [];

  responses: Record<string, StubResponse>;

  constructor(responses: Record<string, StubResponse> = {}) {
    this.responses = responses;
  }

  async send(request: EdrRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const stub = this.responses[request.url] ?? { status: 404, body: { description: `No stub for ${request.url}` } };
    const contentType = stub.contentType ?? 'application/json';
    const response: TransportResponse = {
      status: stub.status ?? 200,
      contentType,
      headers: { 'content-type': contentType, ...stub.headers },
      body: Buffer.from(typeof stub.body === 'string' ? stub.body : JSON.stringify(stub.body), 'utf8'),
    };
    return response;
  }
}
