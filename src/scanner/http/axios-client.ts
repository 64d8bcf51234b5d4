import https from 'https';
import type { Readable } from 'stream';
import axios from 'axios';
import { USER_AGENT, normalizeHeaders } from './headers.js';
import { MAX_BODY_BYTES, readBodyWithLimit } from './body.js';
import type { DetectionMethod } from '../../types/scanner.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../../types/http.js';

/**
 * Enhanced strategy: redirects are reported instead of followed, response
 * time is measured and self-signed certificates are accepted.
 */
export class AxiosHttpClient implements HttpClient {
  readonly method: DetectionMethod = 'enhanced';
  private readonly httpsAgent: https.Agent;

  constructor() {
    this.httpsAgent = new https.Agent({ rejectUnauthorized: false });
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const startTime = Date.now();
    // One deadline for connect, headers and body together
    const signal = AbortSignal.timeout(options.timeoutMs);

    const response = await axios.get<Readable>(url, {
      timeout: options.timeoutMs,
      signal,
      maxRedirects: 0,
      // Every status is an answer; only network failures reject
      validateStatus: () => true,
      // Streamed so the body is cut at the same limit as the basic client
      responseType: 'stream',
      httpsAgent: this.httpsAgent,
      headers: { 'User-Agent': USER_AGENT, ...options.headers },
    });

    const body = await readBodyWithLimit(response.data, MAX_BODY_BYTES, signal);
    const headers = normalizeHeaders(Object.entries(response.headers));

    return {
      status: response.status,
      headers,
      body,
      redirect: headers['location'] ?? null,
      responseTimeMs: Date.now() - startTime,
    };
  }
}
