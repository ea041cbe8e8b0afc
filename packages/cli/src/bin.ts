#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';
import process from 'node:process';

import {
  createProcessCliIo,
  createTickworkCliKernel,
  nextCommandModule,
  runCommandModule,
} from './index.js';

interface PackageManifest {
  readonly version?: string;
  readonly description?: string;
}

const loadPackageManifest = async (): Promise<PackageManifest> => {
  try {
    const contents = await readFile(new URL('../package.json', import.meta.url), 'utf8');
    const manifest: unknown = JSON.parse(contents);
    if (typeof manifest !== 'object' || manifest === null) {
      return {};
    }
    const version = 'version' in manifest ? manifest.version : undefined;
    const description = 'description' in manifest ? manifest.description : undefined;
    return {
      ...(typeof version === 'string' ? { version } : {}),
      ...(typeof description === 'string' ? { description } : {}),
    };
  } catch {
    // Running from a layout without the manifest beside the sources.
    return {};
  }
};

const packageManifest = await loadPackageManifest();

const io = createProcessCliIo({ process });

const kernel = createTickworkCliKernel({
  programName: 'tickwork',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
  modules: [runCommandModule, nextCommandModule],
});

const exitCode = await kernel.run();

io.exit(exitCode);
