import type {
  GroupSummary,
  PortGroup,
  Report,
  ReportEntry,
  ScanResult,
  ScanTarget,
  ServiceDetection,
} from '../types/scanner.js';

export interface AggregateInput {
  target: Pick<ScanTarget, 'host'>;
  results: readonly ScanResult[];
  detections: ReadonlyMap<number, ServiceDetection>;
  groups: readonly PortGroup[];
  labels?: ReadonlyMap<number, string> | undefined;
  interrupted?: boolean | undefined;
}

const ascending = (a: number, b: number): number => a - b;

export function summarizeGroups(groups: readonly PortGroup[], openPorts: ReadonlySet<number>): GroupSummary[] {
  return groups.map((group) => {
    const open = group.ports
      .map(({ port }) => port)
      .filter((port) => openPorts.has(port))
      .sort(ascending);

    return {
      name: group.name,
      description: group.description,
      open: open.length,
      total: group.ports.length,
      openPorts: open,
    };
  });
}

/**
 * Merge scan results and detections into a report ordered by port. Inputs
 * are only read; completion order has no influence on the output.
 */
export function aggregate(input: AggregateInput): Report {
  const { target, results, detections, groups, labels } = input;

  const entries: ReportEntry[] = [...results]
    .sort((a, b) => a.port - b.port)
    .map(({ port, open }) => ({
      port,
      open,
      expected: labels?.get(port) ?? null,
      detection: open ? detections.get(port) ?? null : null,
    }));

  const openPorts = entries.filter((entry) => entry.open).map((entry) => entry.port);
  const closedPorts = entries.filter((entry) => !entry.open).map((entry) => entry.port);

  return {
    host: target.host,
    entries,
    openPorts,
    closedPorts,
    groups: summarizeGroups(groups, new Set(openPorts)),
    interrupted: input.interrupted ?? false,
  };
}
