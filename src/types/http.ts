import type { DetectionMethod } from './scanner.js';

export type HttpProtocol = 'http' | 'https';

export interface HttpRequestOptions {
  timeoutMs: number;
  headers?: Record<string, string> | undefined;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
  // Only reported by clients that capture redirects and timing
  redirect?: string | null | undefined;
  responseTimeMs?: number | undefined;
}

// Network failures reject; HTTP error statuses resolve like any other response
export interface HttpClient {
  readonly method: DetectionMethod;
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}
