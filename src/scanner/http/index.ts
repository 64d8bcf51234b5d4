import { NodeHttpClient } from './node-client.js';
import type { Capabilities } from '../../types/capabilities.js';
import type { HttpClient } from '../../types/http.js';

export { NodeHttpClient } from './node-client.js';
export { USER_AGENT, normalizeHeaders } from './headers.js';
export { MAX_BODY_BYTES } from './body.js';

/**
 * Pick the HTTP strategy once at start-up. The axios-backed client is only
 * loaded when the capability probe found it.
 */
export async function createHttpClient(capabilities: Pick<Capabilities, 'enhancedHttp'>): Promise<HttpClient> {
  if (capabilities.enhancedHttp) {
    const { AxiosHttpClient } = await import('./axios-client.js');
    return new AxiosHttpClient();
  }
  return new NodeHttpClient();
}
