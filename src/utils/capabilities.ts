import type { Capabilities, DependencyStatus } from '../types/capabilities.js';

export type ModuleLoader = (specifier: string) => Promise<unknown>;

// Optional backends; the scanner degrades to a built-in path when one is missing
export const OPTIONAL_DEPENDENCIES: ReadonlyArray<{ name: string; feature: string }> = [
  { name: 'axios', feature: 'enhanced HTTP detection (redirect capture, response timing)' },
  { name: 'smol-toml', feature: 'TOML port list configuration' },
];

const defaultLoader: ModuleLoader = (specifier) => import(specifier);

export async function checkDependencies(load: ModuleLoader = defaultLoader): Promise<DependencyStatus[]> {
  return Promise.all(
    OPTIONAL_DEPENDENCIES.map(async ({ name, feature }) => {
      try {
        await load(name);
        return { name, feature, available: true };
      } catch {
        return { name, feature, available: false };
      }
    })
  );
}

export function supportsRichOutput(
  stream: { isTTY?: boolean | undefined } = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return stream.isTTY === true && env['NO_COLOR'] === undefined;
}

export async function detectCapabilities(load: ModuleLoader = defaultLoader): Promise<Capabilities> {
  const deps = await checkDependencies(load);
  const axios = deps.find((dep) => dep.name === 'axios');

  return {
    enhancedHttp: axios?.available ?? false,
    richOutput: supportsRichOutput(),
  };
}
