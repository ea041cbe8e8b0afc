import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

type LoadedCosmiconfigResult = Exclude<CosmiconfigResult, null>;

export const DEFAULT_CONFIG_FILES = Object.freeze([
  'tickwork.config.mjs',
  'tickwork.config.js',
  'tickwork.config.cjs',
  'tickwork.config.json',
] as const);

const MODULE_NAME = 'tickwork';

const EXPORT_KEYS = ['default', 'config'] as const;

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule<TConfig = unknown> {
  readonly path: string;
  readonly directory: string;
  readonly config: TConfig;
}

export class ConfigFileNotFoundError extends Error {
  constructor(readonly location: string | undefined) {
    super(
      location === undefined
        ? 'Unable to locate tickwork configuration file in the current directory.'
        : `Configuration file not found: ${location}`,
    );
    this.name = 'ConfigFileNotFoundError';
  }
}

const moduleLoader: Loader = async (filepath: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!importedModule || typeof importedModule !== 'object') {
    return importedModule;
  }

  for (const key of EXPORT_KEYS) {
    if (key in importedModule) {
      const exported: unknown = Reflect.get(importedModule, key);
      return exported;
    }
  }

  return importedModule;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) => (result ? await resolveResult(result) : result),
  });
}

/**
 * Determines the absolute path to a tickwork configuration file.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The resolved configuration path.
 * @throws {ConfigFileNotFoundError} When no configuration exists in the provided locations.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const searchPlaces = options.candidates ? [...options.candidates] : [...DEFAULT_CONFIG_FILES];
  const explorer = createExplorer(searchPlaces, cwd);

  if (options.configPath) {
    const resolvedPath = path.resolve(cwd, options.configPath);
    try {
      const loaded = await explorer.load(resolvedPath);
      if (!loaded || loaded.isEmpty) {
        throw new ConfigFileNotFoundError(options.configPath);
      }
      return loaded.filepath;
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ConfigFileNotFoundError(options.configPath);
      }
      throw error;
    }
  }

  const result = await explorer.search(cwd);
  if (!result || result.isEmpty) {
    throw new ConfigFileNotFoundError(undefined);
  }

  return result.filepath;
}

/**
 * Loads a configuration module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded configuration metadata and the resolved configuration value.
 */
export async function loadConfigModule<TConfig = unknown>(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule<TConfig>> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_CONFIG_FILES, path.dirname(resolvedPath));

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new ConfigFileNotFoundError(resolvedPath);
    }

    return {
      path: result.filepath,
      directory: path.dirname(result.filepath),
      config: result.config as TConfig,
    } satisfies LoadedConfigModule<TConfig>;
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigFileNotFoundError(resolvedPath);
    }
    throw error;
  }
}

async function resolveResult(result: LoadedCosmiconfigResult): Promise<LoadedCosmiconfigResult> {
  const config: unknown = await resolveExportedValue(result.config);
  return { ...result, config };
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value = candidate;

  for (;;) {
    if (typeof value === 'function') {
      value = (value as () => unknown)();
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isMissingFileError(error: unknown): error is NodeJS.ErrnoException {
  return Boolean(
    error &&
      typeof error === 'object' &&
      'code' in error &&
      error.code === 'ENOENT',
  );
}
