import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { FileSystemProvider } from '../../fs-provider.js';

import { LifecycleMisuseError } from '../../errors.js';
import { ScratchSpace, sanitizeIdentity } from '../../scratch-space.js';

const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'scratch-space-'));

describe('ScratchSpace', () => {
  let root: string;
  let scratch: ScratchSpace;

  beforeEach(() => {
    root = makeTempDir();
    scratch = new ScratchSpace({ rootDir: root });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('derives the directory from the identity without reserved markers', () => {
    expect(scratch.temporaryDirectoryFor('org.example.JoinSuite$')).toBe(path.join(root, 'org.example.JoinSuite'));
    expect(scratch.temporaryDirectoryFor('org.example.JoinSuite')).toBe(scratch.temporaryDirectoryFor('org.example.JoinSuite$'));
    expect(sanitizeIdentity('A$B$')).toBe('AB');
  });

  it('uses the default data root when none is given', () => {
    expect(new ScratchSpace().temporaryDirectoryFor('Suite')).toBe(path.join('target/test-classes/data/', 'Suite'));
  });

  it('resets a populated directory to an empty one, twice in a row', () => {
    const dir = scratch.reset('Suite');
    fs.writeFileSync(path.join(dir, 'left-over.csv'), 'a,b', 'utf-8');
    fs.mkdirSync(path.join(dir, 'nested'));

    scratch.reset('Suite');
    expect(fs.existsSync(dir)).toBe(true);
    expect(fs.readdirSync(dir)).toEqual([]);

    scratch.reset('Suite');
    expect(fs.existsSync(dir)).toBe(true);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('creates files with the default contents', () => {
    scratch.reset('Suite');
    const file = scratch.createFile('Suite', 'f1.txt');
    expect(file).toBe(path.join(root, 'Suite', 'f1.txt'));
    expect(fs.readFileSync(file, 'utf-8')).toBe('xxx');
  });

  it('overwrites files with exactly the given contents', () => {
    scratch.reset('Suite');
    scratch.createFile('Suite', 'f1.txt', 'first version');
    const file = scratch.createFile('Suite', 'f1.txt', 'a,b\n1,2');
    expect(fs.readFileSync(file, 'utf-8')).toBe('a,b\n1,2');
  });

  it('refuses to create files before the directory exists', () => {
    let caught: unknown;
    try {
      scratch.createFile('NeverReset', 'f.txt');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(LifecycleMisuseError);
    expect(caught).toMatchObject({ kind: 'scratch_missing' });
    expect(fs.existsSync(path.join(root, 'NeverReset'))).toBe(false);
  });
});

describe('ScratchSpace with an injected file system', () => {
  it('deletes before creating and writes through the provider', () => {
    const calls: string[] = [];
    const dirs = new Set<string>();
    const files = new Map<string, string>();
    const fileSystem: FileSystemProvider = {
      exists: (target) => dirs.has(target),
      remove: (target) => { calls.push(`remove ${target}`); dirs.delete(target); },
      mkdir: (target) => { calls.push(`mkdir ${target}`); dirs.add(target); },
      writeText: (target, contents) => { calls.push(`write ${target}`); files.set(target, contents); },
      readText: (target) => files.get(target) ?? '',
    };
    const scratch = new ScratchSpace({ rootDir: '/data', fileSystem });

    scratch.reset('Suite$');
    const file = scratch.createFile('Suite$', 'a.csv', 'k\n1');

    expect(calls).toEqual([
      `remove ${path.join('/data', 'Suite')}`,
      `mkdir ${path.join('/data', 'Suite')}`,
      `write ${path.join('/data', 'Suite', 'a.csv')}`,
    ]);
    expect(files.get(file)).toBe('k\n1');
  });
});
