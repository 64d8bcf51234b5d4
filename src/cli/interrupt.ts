import { EXIT_OK } from './app.js';

/**
 * SIGINT handler: the first interrupt aborts the scan so the partial report
 * still prints; a second one exits at once. Both count as a normal exit.
 */
export function createInterruptHandler(controller: AbortController, exit: (code: number) => void): () => void {
  return () => {
    if (controller.signal.aborted) {
      exit(EXIT_OK);
      return;
    }
    controller.abort();
  };
}
