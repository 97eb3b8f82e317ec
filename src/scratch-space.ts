import path from 'node:path';

import type { Logger } from './logging/logger-registry.js';

import { LifecycleMisuseError } from './errors.js';
import { nodeFileSystem, type FileSystemProvider } from './fs-provider.js';

export const DEFAULT_TEST_DATA_DIR = 'target/test-classes/data/';

// Test frameworks append '$' to generated class names; it never belongs in a path.
const RESERVED_MARKER = /\$/g;

export const DEFAULT_FILE_CONTENTS = 'xxx';

export interface ScratchSpaceOptions {
  rootDir?: string;
  fileSystem?: FileSystemProvider;
  logger?: Logger;
}

/** Per-test-class scratch directories under a shared data root. Never removed on teardown. */
export class ScratchSpace {
  readonly rootDir: string;
  private readonly fileSystem: FileSystemProvider;
  private readonly logger?: Logger;

  constructor(options: ScratchSpaceOptions = {}) {
    this.rootDir = options.rootDir ?? DEFAULT_TEST_DATA_DIR;
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger;
  }

  temporaryDirectoryFor(identity: string): string {
    return path.join(this.rootDir, sanitizeIdentity(identity));
  }

  /** Wipes the directory for `identity` and recreates it empty. */
  reset(identity: string): string {
    const dir = this.temporaryDirectoryFor(identity);
    this.fileSystem.remove(dir);
    this.fileSystem.mkdir(dir);
    this.logger?.verbose('scratch directory reset', { dir });
    return dir;
  }

  createFile(identity: string, baseName: string, contents: string = DEFAULT_FILE_CONTENTS): string {
    const dir = this.temporaryDirectoryFor(identity);
    if (!this.fileSystem.exists(dir)) {
      throw new LifecycleMisuseError(
        'scratch_missing',
        `scratch directory ${dir} does not exist; call reset('${identity}') first`,
      );
    }
    const target = path.join(dir, baseName);
    this.fileSystem.writeText(target, contents);
    return target;
  }
}

export const sanitizeIdentity = (identity: string): string => identity.replace(RESERVED_MARKER, '');
