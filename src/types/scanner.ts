// Port scanner types

export type Confidence = 'high' | 'medium' | 'low';

export type DetectionMethod = 'basic' | 'enhanced';

export interface PortSpec {
  port: number;
  label: string;
}

export interface PortGroup {
  name: string;
  description: string;
  ports: PortSpec[];
}

export interface ScanTarget {
  host: string;
  ports: number[];
  timeoutMs: number;
  concurrency: number;
}

export interface ScanResult {
  port: number;
  open: boolean;
}

export interface ServiceDetection {
  service: string;
  version: string | null;
  confidence: Confidence;
  method: DetectionMethod;
  details: Record<string, unknown>;
}

export interface ScanOutcome {
  results: ScanResult[];
  interrupted: boolean;
}

export interface ScanOptions {
  signal?: AbortSignal | undefined;
  onResult?: ((result: ScanResult, completed: number, total: number) => void) | undefined;
}

export interface ReportEntry {
  port: number;
  open: boolean;
  expected: string | null;
  detection: ServiceDetection | null;
}

export interface GroupSummary {
  name: string;
  description: string;
  open: number;
  total: number;
  openPorts: number[];
}

export interface Report {
  host: string;
  entries: ReportEntry[];
  openPorts: number[];
  closedPorts: number[];
  groups: GroupSummary[];
  interrupted: boolean;
}

// Write-only destination for user-facing scan output
export interface ReportSink {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export interface PortScanWorkerOptions {
  detectServices?: boolean | undefined;
  maxDetectionConcurrency?: number | undefined;
}
