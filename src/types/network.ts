import type { Socket } from 'net';

// Opens a connected TCP socket or rejects on failure/timeout
export type Dialer = (host: string, port: number, timeoutMs: number) => Promise<Socket>;
