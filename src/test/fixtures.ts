import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((innerResolve, innerReject) => {
    resolve = innerResolve;
    reject = innerReject;
  });
  return { promise, resolve, reject };
}

export function createTempDir(prefix = 'bardbox-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

export interface SoundboardDirectories {
  root: string;
  staticDir: string;
  musicDir: string;
  iconDir: string;
  mappingFile: string;
}

export async function createSoundboardDirectories(): Promise<SoundboardDirectories> {
  const root = await createTempDir();
  const staticDir = path.join(root, 'static');
  const musicDir = path.join(staticDir, 'music');
  const iconDir = path.join(staticDir, 'icons');
  await mkdir(musicDir, { recursive: true });
  await mkdir(iconDir, { recursive: true });
  return {
    root,
    staticDir,
    musicDir,
    iconDir,
    mappingFile: path.join(root, 'data', 'mappings.json'),
  };
}

export async function writeAsset(directory: string, name: string, contents = 'test-bytes'): Promise<void> {
  await writeFile(path.join(directory, name), contents);
}
