// Scanner types
export type {
  Confidence,
  DetectionMethod,
  PortSpec,
  PortGroup,
  ScanTarget,
  ScanResult,
  ServiceDetection,
  ScanOutcome,
  ScanOptions,
  ReportEntry,
  GroupSummary,
  Report,
  ReportSink,
  PortScanWorkerOptions,
} from './scanner.js';

// HTTP types
export type {
  HttpProtocol,
  HttpRequestOptions,
  HttpResponse,
  HttpClient,
} from './http.js';

// Network types
export type { Dialer } from './network.js';

// Capability types
export type { Capabilities, DependencyStatus } from './capabilities.js';
