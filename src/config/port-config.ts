import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from 'winston';
import { PortListsDocumentSchema, PortNumberSchema } from '../schemas/config.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import type { PortGroup, PortSpec } from '../types/scanner.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Same relative location from src/config and dist/config
export const BUNDLED_CONFIG_PATH = path.resolve(__dirname, '..', '..', 'config', 'ports.toml');

export const DEFAULT_PORT_GROUPS: readonly PortGroup[] = [
  {
    name: 'common',
    description: 'Basic common ports',
    ports: [
      { port: 22, label: 'SSH' },
      { port: 80, label: 'HTTP' },
      { port: 443, label: 'HTTPS' },
      { port: 3000, label: 'Node.js Dev' },
      { port: 5432, label: 'PostgreSQL' },
    ],
  },
];

export type TomlParser = (source: string) => unknown;

export interface PortConfig {
  groups: PortGroup[];
  source: string | null;
}

export interface PortConfigLoaderOptions {
  logger: Logger;
  candidates?: string[] | undefined;
  loadParser?: (() => Promise<TomlParser>) | undefined;
}

export function getConfigCandidates(
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string[] {
  const userConfigDir = path.join(home, '.config', 'portsweep');
  const candidates = [
    path.join(userConfigDir, 'scan-ports.toml'),
    path.join(userConfigDir, 'config.toml'),
    BUNDLED_CONFIG_PATH,
  ];

  const override = env['PORTSWEEP_CONFIG'];
  return override ? [path.resolve(override), ...candidates] : candidates;
}

// Scalar labels are taken as text; tables and arrays are not labels
function toLabel(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

/**
 * Validate a parsed port list document into typed groups.
 *
 * Group names are normalized to lower case. Port keys that are not integers
 * in 1..65535 are dropped, as are entries whose label is a table or array
 * and groups left without any port. Numeric and boolean labels become text.
 */
export function parsePortListsDocument(raw: unknown, logger: Logger, source = 'config'): PortGroup[] {
  const parsed = PortListsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document';
    throw new ConfigurationError(`Invalid port list document (${where})`, source);
  }

  const groups: PortGroup[] = [];

  for (const [rawName, entry] of Object.entries(parsed.data.port_lists)) {
    const name = rawName.trim().toLowerCase();
    const ports: PortSpec[] = [];

    for (const [key, value] of Object.entries(entry.ports)) {
      const port = /^\d+$/.test(key.trim()) ? Number(key) : Number.NaN;
      if (!PortNumberSchema.safeParse(port).success) {
        logger.warn(`Ignoring invalid port "${key}" in list "${name}"`, { source });
        continue;
      }

      const label = toLabel(value);
      if (label === null) {
        logger.warn(`Ignoring port ${port} in list "${name}": label is not text`, { source });
        continue;
      }
      ports.push({ port, label });
    }

    if (ports.length === 0) {
      logger.warn(`Port list "${name}" has no valid ports, skipping`, { source });
      continue;
    }

    groups.push({ name, description: entry.description, ports });
  }

  return groups;
}

async function loadSmolToml(): Promise<TomlParser> {
  const { parse } = await import('smol-toml');
  return parse;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export class PortConfigLoader {
  private readonly logger: Logger;
  private readonly candidates: string[];
  private readonly loadParser: () => Promise<TomlParser>;

  constructor(options: PortConfigLoaderOptions) {
    this.logger = options.logger;
    this.candidates = options.candidates ?? getConfigCandidates();
    this.loadParser = options.loadParser ?? loadSmolToml;
  }

  async load(): Promise<PortConfig> {
    let parse: TomlParser;
    try {
      parse = await this.loadParser();
    } catch (error) {
      this.logger.warn('TOML support not available, using default port list', { error: errorMessage(error) });
      return this.fallback();
    }

    const source = await this.findConfigFile();
    if (!source) {
      this.logger.warn('Config file not found in any location, using default port list');
      return this.fallback();
    }

    try {
      const content = await fs.readFile(source, 'utf8');
      const groups = parsePortListsDocument(parse(content), this.logger, source);

      if (groups.length === 0) {
        this.logger.warn('Config defines no port lists, using default port list', { source });
        return this.fallback();
      }

      this.logger.info(`Loaded port config: ${source}`);
      return { groups, source };
    } catch (error) {
      this.logger.warn(`Error loading port config: ${errorMessage(error)}, using default port list`, { source });
      return this.fallback();
    }
  }

  private async findConfigFile(): Promise<string | null> {
    for (const candidate of this.candidates) {
      if (await exists(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  private fallback(): PortConfig {
    return {
      groups: DEFAULT_PORT_GROUPS.map((group) => ({ ...group, ports: group.ports.map((spec) => ({ ...spec })) })),
      source: null,
    };
  }
}
