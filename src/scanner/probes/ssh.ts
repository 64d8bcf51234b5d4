import { withSession } from '../tcp-session.js';
import { SSH_PORT, SSH_PORT_RANGE } from '../signatures.js';
import type { DetectionTier, ProbeContext, TierDetection } from './types.js';

// SSH servers announce their version string as soon as the connection opens
export class SshTier implements DetectionTier {
  readonly name = 'ssh';

  appliesTo(port: number): boolean {
    const [low, high] = SSH_PORT_RANGE;
    return port === SSH_PORT || (port >= low && port <= high);
  }

  async detect({ host, port, timeoutMs, dial }: ProbeContext): Promise<TierDetection | null> {
    const banner = await withSession(host, port, timeoutMs, dial, (session) => session.readText(timeoutMs));

    if (!banner?.startsWith('SSH')) {
      return null;
    }

    return {
      service: 'SSH',
      version: banner.trim(),
      confidence: 'high',
      details: {},
    };
  }
}
