// HTTP seam between the registry client and the Companies House API

import { REGISTRY_API_BASE } from '../config/reference-data.js';
import type { QueryParams } from './response-cache.js';

export interface TransportResponse {
  status: number;
  /** Parsed JSON for 200 responses, otherwise undefined */
  body: unknown;
}

export interface RegistryTransport {
  get(path: string, params: QueryParams): Promise<TransportResponse>;
}

export interface HttpTransportOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class HttpRegistryTransport implements RegistryTransport {
  private readonly authorization: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HttpTransportOptions) {
    this.authorization = `Basic ${Buffer.from(`${options.apiKey}:`).toString('base64')}`;
    this.baseUrl = (options.baseUrl ?? REGISTRY_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async get(path: string, params: QueryParams): Promise<TransportResponse> {
    const url = new URL(this.baseUrl + path);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json', 'Authorization': this.authorization },
        signal: controller.signal,
      });
      if (res.status !== 200) {
        await res.body?.cancel();
        return { status: res.status, body: undefined };
      }
      const body: unknown = await res.json();
      return { status: res.status, body };
    } finally {
      clearTimeout(timeout);
    }
  }
}
