import type { Readable } from 'stream';

export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Read a response body up to `maxBytes`, then stop. Both HTTP strategies
 * return bodies cut at the same byte. Rejects once `signal` aborts.
 */
export function readBodyWithLimit(stream: Readable, maxBytes: number, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    const onAbort = (): void => {
      stream.destroy();
      reject(new Error('Response body not received before the deadline'));
    };

    const done = (): void => {
      signal?.removeEventListener('abort', onAbort);
      resolve(Buffer.concat(chunks).toString('utf8'));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    stream.on('data', (chunk: Buffer) => {
      const remaining = maxBytes - totalBytes;
      if (chunk.length >= remaining) {
        chunks.push(chunk.subarray(0, remaining));
        totalBytes = maxBytes;
        done();
        stream.destroy();
        return;
      }
      chunks.push(chunk);
      totalBytes += chunk.length;
    });

    stream.on('end', done);
    stream.on('error', (error) => {
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}
