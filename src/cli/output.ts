import type { DependencyStatus } from '../types/capabilities.js';
import type { Confidence, Report, ReportEntry, ReportSink, ServiceDetection } from '../types/scanner.js';

export interface RenderOptions {
  rich: boolean;
  showClosed: boolean;
  detectServices: boolean;
  showGroups: boolean;
}

const RULE = '='.repeat(72);

const CONFIDENCE_EMOJI: Record<Confidence, string> = {
  high: '🎯',
  medium: '🔍',
  low: '❓',
};

export class ConsoleSink implements ReportSink {
  constructor(private readonly rich: boolean) {}

  info(message: string): void {
    console.log(message);
  }

  warning(message: string): void {
    console.warn(this.rich ? `⚠️  ${message}` : `Warning: ${message}`);
  }

  error(message: string): void {
    console.error(this.rich ? `❌ ${message}` : `Error: ${message}`);
  }
}

function marker(detection: ServiceDetection, rich: boolean): string {
  if (rich) {
    return `${CONFIDENCE_EMOJI[detection.confidence]}${detection.method === 'enhanced' ? '🚀' : '🔧'} `;
  }
  return `[${detection.confidence}/${detection.method}] `;
}

export function formatDetection(detection: ServiceDetection, rich: boolean): string {
  const version = detection.version ? ` (${detection.version.slice(0, 30)})` : '';
  return `${marker(detection, rich)}${detection.service}${version}`;
}

function detailLines(detection: ServiceDetection): string[] {
  const lines: string[] = [];
  const { title, server, redirect } = detection.details;

  if (typeof title === 'string' && title) {
    lines.push(`        └─ Title: ${title}`);
  }
  if (typeof server === 'string' && server && server !== 'Unknown') {
    lines.push(`        └─ Server: ${server}`);
  }
  if (typeof redirect === 'string' && redirect) {
    lines.push(`        └─ Redirects to: ${redirect}`);
  }
  return lines;
}

function entryLines(entry: ReportEntry, options: RenderOptions): string[] {
  const port = String(entry.port).padStart(5);
  const expected = entry.expected ?? '-';

  if (!entry.open) {
    return [`Port ${port} | ${expected.padEnd(25)} | ${options.rich ? '❌ ' : ''}CLOSED`];
  }

  if (options.detectServices && entry.detection) {
    return [
      `Port ${port} | Expected: ${expected.padEnd(20)} | Detected: ${formatDetection(entry.detection, options.rich)}`,
      ...detailLines(entry.detection),
    ];
  }

  return [`Port ${port} | ${expected.padEnd(25)} | ${options.rich ? '✅ ' : ''}OPEN`];
}

export function renderReport(report: Report, options: RenderOptions): string[] {
  const lines: string[] = [];
  const total = report.entries.length;

  lines.push(RULE);
  lines.push(options.detectServices ? 'OPEN PORTS WITH SERVICE DETECTION:' : 'OPEN PORTS:');
  lines.push(RULE);

  for (const entry of report.entries) {
    if (entry.open || options.showClosed) {
      lines.push(...entryLines(entry, options));
    }
  }

  lines.push(RULE);
  lines.push(
    `${options.rich ? '📊 ' : ''}Summary: ${report.openPorts.length} open, ${report.closedPorts.length} closed out of ${total} total`
  );
  if (report.openPorts.length > 0) {
    lines.push(`${options.rich ? '🔓 ' : ''}Open ports: ${report.openPorts.join(', ')}`);
  }

  if (options.showGroups && report.groups.length > 0) {
    lines.push('');
    lines.push(`${options.rich ? '📂 ' : ''}Results by category:`);
    for (const group of report.groups) {
      const suffix = group.open > 0 ? ` - ${group.openPorts.join(', ')}` : '';
      lines.push(`  ${group.name.padEnd(12)}: ${group.open}/${group.total} open${suffix}`);
    }
  }

  return lines;
}

export function renderDependencyStatus(statuses: readonly DependencyStatus[], rich: boolean): string[] {
  const lines = ['Optional Dependencies Status:'];

  for (const status of statuses) {
    const state = status.available ? (rich ? '✅ Available' : 'Available') : rich ? '❌ Missing' : 'Missing';
    lines.push(`  ${status.name.padEnd(10)}: ${state} - ${status.feature}`);
  }

  const missing = statuses.filter((status) => !status.available).map((status) => status.name);
  if (missing.length > 0) {
    lines.push('');
    lines.push(`To enable the missing features: npm install ${missing.join(' ')}`);
  }

  return lines;
}
