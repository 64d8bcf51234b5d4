import http, { type IncomingMessage } from 'http';
import https from 'https';
import { USER_AGENT, normalizeHeaders } from './headers.js';
import { MAX_BODY_BYTES, readBodyWithLimit } from './body.js';
import type { DetectionMethod } from '../../types/scanner.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../../types/http.js';

/**
 * Basic strategy built on Node's http/https modules. Same fields as the
 * enhanced client, without redirect capture or timing.
 */
export class NodeHttpClient implements HttpClient {
  readonly method: DetectionMethod = 'basic';

  get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    // One deadline for connect, headers and body together
    const signal = AbortSignal.timeout(options.timeoutMs);

    return new Promise((resolve, reject) => {
      const target = new URL(url);
      const requestOptions: http.RequestOptions = {
        signal,
        headers: { 'User-Agent': USER_AGENT, ...options.headers },
      };

      const onResponse = (response: IncomingMessage): void => {
        readBodyWithLimit(response, MAX_BODY_BYTES, signal).then(
          (body) =>
            resolve({
              status: response.statusCode ?? 0,
              headers: normalizeHeaders(Object.entries(response.headers)),
              body,
            }),
          reject
        );
      };

      const request = target.protocol === 'https:'
        ? https.get(target, { ...requestOptions, rejectUnauthorized: false }, onResponse)
        : http.get(target, requestOptions, onResponse);

      request.on('error', (error) => {
        reject(signal.aborted ? new Error(`Request to ${url} timed out after ${options.timeoutMs}ms`) : error);
      });
    });
  }
}
