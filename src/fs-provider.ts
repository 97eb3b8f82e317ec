import fs from 'node:fs';

export interface FileSystemProvider {
  exists(target: string): boolean;
  remove(target: string): void;
  mkdir(target: string): void;
  writeText(target: string, contents: string): void;
  readText(target: string): string;
}

export const nodeFileSystem: FileSystemProvider = {
  exists: (target) => fs.existsSync(target),
  remove: (target) => {
    fs.rmSync(target, { recursive: true, force: true });
  },
  mkdir: (target) => {
    fs.mkdirSync(target, { recursive: true });
  },
  writeText: (target, contents) => {
    fs.writeFileSync(target, contents, 'utf-8');
  },
  readText: (target) => fs.readFileSync(target, 'utf-8'),
};
