import type { PortGroup, ReportSink } from '../types/scanner.js';

export const ALL_LISTS = 'all';

export type WarningHandler = (message: string) => void;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function mergeGroup(target: Map<number, string>, group: PortGroup): void {
  for (const { port, label } of group.ports) {
    // First label seen for a port wins
    if (!target.has(port)) {
      target.set(port, label);
    }
  }
}

/**
 * Resolve list names into a port -> expected label map.
 *
 * `all` anywhere in `names` selects every group in registry order. Otherwise
 * names are merged in the order given; unknown names are reported through
 * `warn` and skipped.
 */
export function resolvePortLists(
  names: readonly string[],
  groups: readonly PortGroup[],
  warn: WarningHandler = () => undefined
): Map<number, string> {
  const ports = new Map<number, string>();
  const normalized = names.map(normalizeName).filter((name) => name.length > 0);

  if (normalized.includes(ALL_LISTS)) {
    for (const group of groups) {
      mergeGroup(ports, group);
    }
    return ports;
  }

  const byName = new Map(groups.map((group) => [group.name, group]));
  const available = groups.map((group) => group.name).join(', ');

  for (const name of normalized) {
    const group = byName.get(name);
    if (!group) {
      warn(`Port list '${name}' not found. Available lists: ${available}`);
      continue;
    }
    mergeGroup(ports, group);
  }

  return ports;
}

export class PortListRegistry {
  private readonly groups: readonly PortGroup[];
  private readonly sink: ReportSink | null;

  constructor(groups: readonly PortGroup[], sink: ReportSink | null = null) {
    this.groups = groups;
    this.sink = sink;
  }

  resolve(names: readonly string[]): Map<number, string> {
    return resolvePortLists(names, this.groups, (message) => this.sink?.warning(message));
  }

  allPorts(): Map<number, string> {
    return this.resolve([ALL_LISTS]);
  }

  listGroups(): readonly PortGroup[] {
    return this.groups;
  }

  getGroup(name: string): PortGroup | undefined {
    const wanted = normalizeName(name);
    return this.groups.find((group) => group.name === wanted);
  }

  getAvailableNames(): string[] {
    return this.groups.map((group) => group.name);
  }

  // Lines for --show-lists: each group with a preview of its first ports
  describe(previewSize = 5): string[] {
    const lines: string[] = [];

    for (const group of this.groups) {
      lines.push('');
      lines.push(group.name.toUpperCase());
      lines.push(`   Description: ${group.description}`);
      lines.push(`   Ports: ${group.ports.length} defined`);
      for (const { port, label } of group.ports.slice(0, previewSize)) {
        lines.push(`   - ${port}: ${label}`);
      }
      if (group.ports.length > previewSize) {
        lines.push(`   ... and ${group.ports.length - previewSize} more`);
      }
    }

    return lines;
  }
}
