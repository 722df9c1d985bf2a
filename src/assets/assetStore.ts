import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { access, mkdir, readdir, rename, rm, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import type { AssetType } from '../types/assets';
import { isSupportedAssetFileName } from './assetNames';

/**
 * Filesystem-like storage for music and icon files, addressed by asset type
 * and file name. Implementations do no locking; callers serialize per name.
 */
export interface AssetStore {
  exists(assetType: AssetType, name: string): Promise<boolean>;
  /** Names of files whose extension matches the asset type, sorted. */
  list(assetType: AssetType): Promise<string[]>;
  rename(assetType: AssetType, oldName: string, newName: string): Promise<void>;
  remove(assetType: AssetType, name: string): Promise<void>;
  write(assetType: AssetType, name: string, source: Readable | Uint8Array): Promise<void>;
  resolvePath(assetType: AssetType, name: string): string;
}

export interface AssetDirectories {
  musicDir: string;
  iconDir: string;
}

export class FileSystemAssetStore implements AssetStore {
  constructor(private readonly directories: AssetDirectories) {}

  async ensureDirectories(): Promise<void> {
    await mkdir(this.directories.musicDir, { recursive: true });
    await mkdir(this.directories.iconDir, { recursive: true });
  }

  resolvePath(assetType: AssetType, name: string): string {
    return path.join(this.directoryFor(assetType), name);
  }

  async exists(assetType: AssetType, name: string): Promise<boolean> {
    try {
      await access(this.resolvePath(assetType, name));
      return true;
    } catch {
      return false;
    }
  }

  async list(assetType: AssetType): Promise<string[]> {
    const entries = await readdir(this.directoryFor(assetType), { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && isSupportedAssetFileName(assetType, entry.name))
      .map((entry) => entry.name)
      .sort((left, right) => left.localeCompare(right));
  }

  async rename(assetType: AssetType, oldName: string, newName: string): Promise<void> {
    await rename(this.resolvePath(assetType, oldName), this.resolvePath(assetType, newName));
  }

  async remove(assetType: AssetType, name: string): Promise<void> {
    await unlink(this.resolvePath(assetType, name));
  }

  async write(assetType: AssetType, name: string, source: Readable | Uint8Array): Promise<void> {
    const targetPath = this.resolvePath(assetType, name);
    const tempPath = path.join(this.directoryFor(assetType), `.${name}.${randomUUID()}.upload`);

    try {
      if (source instanceof Uint8Array) {
        await writeFile(tempPath, source);
      } else {
        await pipeline(source, createWriteStream(tempPath));
      }
      await rename(tempPath, targetPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private directoryFor(assetType: AssetType): string {
    return assetType === 'music' ? this.directories.musicDir : this.directories.iconDir;
  }
}
