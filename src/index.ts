#!/usr/bin/env node
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { runCli, EXIT_FAILURE } from './cli/app.js';
import { createInterruptHandler } from './cli/interrupt.js';
import { errorMessage } from './utils/errors.js';

export { runCli, type CliDeps } from './cli/app.js';
export { TcpScanner } from './scanner/tcp-scanner.js';
export { TcpPortChecker, type PortChecker } from './scanner/port-checker.js';
export { ServiceDetector, createDefaultTiers } from './scanner/service-detector.js';
export { PortScanWorker, type ScanJob } from './scanner/worker.js';
export { PortListRegistry, resolvePortLists, ALL_LISTS } from './scanner/port-lists.js';
export { aggregate, summarizeGroups } from './scanner/result-aggregator.js';
export { createScanTarget, portRange } from './scanner/scan-target.js';
export { PortConfigLoader, DEFAULT_PORT_GROUPS, type PortConfig } from './config/port-config.js';
export { createHttpClient, NodeHttpClient } from './scanner/http/index.js';
export {
  CliOptionsSchema,
  PortListsDocumentSchema,
  ScanTargetSchema,
  type CliOptions,
  type PortListsDocument,
} from './schemas/index.js';
export { AppError, ValidationError, ConfigurationError } from './utils/errors.js';
export { VERSION } from './version.js';
export type * from './types/index.js';

async function main(): Promise<void> {
  const controller = new AbortController();

  process.on('SIGINT', createInterruptHandler(controller, (code) => process.exit(code)));

  const code = await runCli(process.argv.slice(2), { signal: controller.signal });
  process.exit(code);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(script)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_FAILURE);
  });
}
