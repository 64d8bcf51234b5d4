import type { Logger } from 'winston';
import { parseCliArgs, USAGE } from './args.js';
import { ConsoleSink, renderDependencyStatus, renderReport } from './output.js';
import { PortConfigLoader, type PortConfig } from '../config/port-config.js';
import { PortListRegistry } from '../scanner/port-lists.js';
import { TcpScanner } from '../scanner/tcp-scanner.js';
import { TcpPortChecker, type PortChecker } from '../scanner/port-checker.js';
import { ServiceDetector } from '../scanner/service-detector.js';
import { PortScanWorker } from '../scanner/worker.js';
import { createHttpClient } from '../scanner/http/index.js';
import { connectTcp } from '../scanner/tcp-session.js';
import {
  createScanTarget,
  FAST_TIMEOUT_SECONDS,
  portRange,
} from '../scanner/scan-target.js';
import { checkDependencies, detectCapabilities, supportsRichOutput, type ModuleLoader } from '../utils/capabilities.js';
import { createLogger } from '../utils/logger.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { VERSION } from '../version.js';
import type { CliOptions } from '../schemas/cli.js';
import type { Capabilities } from '../types/capabilities.js';
import type { HttpClient } from '../types/http.js';
import type { Dialer } from '../types/network.js';
import type { ReportSink } from '../types/scanner.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

// Everything the CLI touches in the outside world; tests swap these out
export interface CliDeps {
  sink?: ReportSink | undefined;
  logger?: Logger | undefined;
  loadConfig?: ((logger: Logger) => Promise<PortConfig>) | undefined;
  checker?: PortChecker | undefined;
  dial?: Dialer | undefined;
  httpClient?: HttpClient | undefined;
  capabilities?: Capabilities | undefined;
  loadModule?: ModuleLoader | undefined;
  signal?: AbortSignal | undefined;
}

type ScanMode = 'single' | 'range' | 'list' | 'all';

interface PortSelection {
  mode: ScanMode;
  ports: number[];
  labels: Map<number, string>;
}

function selectPorts(options: CliOptions, registry: PortListRegistry): PortSelection {
  const known = registry.allPorts();

  if (options.port !== undefined) {
    return { mode: 'single', ports: [options.port], labels: known };
  }

  if (options.range) {
    const [start, end] = options.range;
    return { mode: 'range', ports: portRange(start, end), labels: known };
  }

  if (options.list !== undefined) {
    const names = options.list.split(',').map((name) => name.trim());
    const labels = registry.resolve(names);
    if (labels.size === 0) {
      throw new ValidationError(
        `No valid ports found in specified lists. Available lists: ${registry.getAvailableNames().join(', ')}`
      );
    }
    return { mode: 'list', ports: [...labels.keys()], labels };
  }

  if (known.size === 0) {
    throw new ValidationError('No ports configured');
  }
  return { mode: 'all', ports: [...known.keys()], labels: known };
}

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const rich = deps.capabilities?.richOutput ?? supportsRichOutput();
  const sink = deps.sink ?? new ConsoleSink(rich);

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    sink.error(`${errorMessage(error)}\nUse --help for usage`);
    return EXIT_FAILURE;
  }

  if (options.help) {
    sink.info(USAGE);
    return EXIT_OK;
  }
  if (options.version) {
    sink.info(`portsweep ${VERSION}`);
    return EXIT_OK;
  }

  const logger = deps.logger ?? createLogger({ name: 'portsweep', ...(options.verbose ? { level: 'debug' } : {}) });

  try {
    if (options.checkDeps) {
      const statuses = await checkDependencies(deps.loadModule);
      renderDependencyStatus(statuses, rich).forEach((line) => sink.info(line));
      return EXIT_OK;
    }

    const config = deps.loadConfig
      ? await deps.loadConfig(logger)
      : await new PortConfigLoader({ logger }).load();
    const registry = new PortListRegistry(config.groups, sink);

    if (options.showLists) {
      sink.info('Available Port Lists:');
      registry.describe().forEach((line) => sink.info(line));
      sink.info('');
      sink.info('Usage: portsweep -l <list_name> or portsweep -l <list1>,<list2>');
      return EXIT_OK;
    }

    const selection = selectPorts(options, registry);
    const timeoutSeconds = options.fast ? FAST_TIMEOUT_SECONDS : options.timeout;
    const target = createScanTarget({
      host: options.host,
      ports: selection.ports,
      timeoutMs: timeoutSeconds * 1000,
      concurrency: options.threads,
    });

    // Range scans report liveness only
    const detectServices = !options.noServiceDetection && selection.mode !== 'range';

    sink.info(`Target: ${target.host}`);
    sink.info(`Timeout: ${timeoutSeconds}s`);
    sink.info(`Threads: ${target.concurrency}`);
    sink.info(`Service Detection: ${detectServices ? 'Enabled' : 'Disabled'}`);
    sink.info(`Scanning ${target.ports.length} ports (${selection.mode})`);

    const capabilities = deps.capabilities ?? (await detectCapabilities(deps.loadModule));
    const http = deps.httpClient ?? (await createHttpClient(capabilities));
    const dial = deps.dial ?? connectTcp;

    const worker = new PortScanWorker(
      {
        scanner: new TcpScanner(logger, deps.checker ?? new TcpPortChecker(dial)),
        detector: new ServiceDetector({ http, logger, dial }),
        logger,
        sink,
      },
      { detectServices }
    );

    const report = await worker.run(
      { target, groups: registry.listGroups(), labels: selection.labels },
      deps.signal
    );

    renderReport(report, {
      rich,
      showClosed: options.showClosed,
      detectServices,
      showGroups: selection.mode === 'list' || selection.mode === 'all',
    }).forEach((line) => sink.info(line));

    if (report.interrupted) {
      sink.warning('Scan interrupted by user');
    }

    return EXIT_OK;
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      logger.debug('Unhandled error', { error: error instanceof Error ? error.stack : String(error) });
    }
    sink.error(errorMessage(error));
    return EXIT_FAILURE;
  }
}
