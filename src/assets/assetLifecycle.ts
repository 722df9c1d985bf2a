import { randomUUID } from 'node:crypto';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';

import { AssetNotFoundError, ConflictError, InvalidRequestError, NotFoundError } from '../errors/soundboardErrors';
import type { PlaybackController } from '../playback/playbackController';
import type { MappingRegistry } from '../storage/mappingRegistry';
import type { AssetCatalog, AssetType } from '../types/assets';
import type { Slot, SlotPatch } from '../types/slots';
import { KeyedSerialQueue } from '../utils/serialQueue';
import { isSafeAssetName, isSupportedAssetFileName, resolveRenamedAssetName } from './assetNames';
import type { AssetStore } from './assetStore';

export interface SoundboardCatalog extends AssetCatalog {
  slots: Slot[];
}

export interface AssetLifecycleOptions {
  assets: AssetStore;
  registry: MappingRegistry;
  playback: PlaybackController;
  logger?: Logger;
}

function lockKey(assetType: AssetType, name: string): string {
  return `${assetType}:${name}`;
}

/**
 * Pairs every physical change in the asset store with the registry update it
 * implies. Operations on the same asset name are serialized; the file change
 * and the reference rewrite happen under one registry lock.
 */
export class AssetLifecycle {
  private readonly assets: AssetStore;
  private readonly registry: MappingRegistry;
  private readonly playback: PlaybackController;
  private readonly logger?: Logger;
  private readonly locks = new KeyedSerialQueue();

  constructor(options: AssetLifecycleOptions) {
    this.assets = options.assets;
    this.registry = options.registry;
    this.playback = options.playback;
    this.logger = options.logger;
  }

  async catalog(): Promise<SoundboardCatalog> {
    const [document, music, icons] = await Promise.all([
      this.registry.load(),
      this.assets.list('music'),
      this.assets.list('icon'),
    ]);
    return {
      slots: document.slots,
      music,
      icons,
    };
  }

  async upload(assetType: AssetType, name: string, source: Readable | Uint8Array): Promise<string> {
    if (!isSafeAssetName(name)) {
      throw new InvalidRequestError(`Invalid file name: ${name}`);
    }
    if (!isSupportedAssetFileName(assetType, name)) {
      throw new InvalidRequestError(`Unsupported ${assetType} file type: ${name}`);
    }

    await this.locks.run([lockKey(assetType, name)], () => this.assets.write(assetType, name, source));
    this.logger?.info({ assetType, name }, 'Asset uploaded');
    return name;
  }

  /** Renames an asset and every slot reference to it. Returns the resolved new name. */
  async rename(assetType: AssetType, oldName: string, newBase: string): Promise<string> {
    const newName = resolveRenamedAssetName(oldName, newBase);
    if (!isSafeAssetName(oldName) || !isSafeAssetName(newName)) {
      throw new InvalidRequestError('Asset names must be plain file names.');
    }
    if (newName === oldName) {
      throw new ConflictError(`An asset named ${newName} already exists.`);
    }

    return this.locks.run([lockKey(assetType, oldName), lockKey(assetType, newName)], async () => {
      if (!(await this.assets.exists(assetType, oldName))) {
        throw new ConflictError(`Source asset ${oldName} does not exist.`);
      }
      if (await this.assets.exists(assetType, newName)) {
        throw new ConflictError(`An asset named ${newName} already exists.`);
      }

      if (assetType === 'music') {
        await this.playback.releaseIfPlaying(oldName);
      }

      const changed = await this.registry.exclusive(async (session) => {
        await this.assets.rename(assetType, oldName, newName);
        try {
          return await session.renameReferences(assetType, oldName, newName);
        } catch (error) {
          await this.assets.rename(assetType, newName, oldName).catch((rollbackError: unknown) => {
            this.logger?.error({ err: rollbackError, assetType, oldName, newName }, 'Could not roll back asset rename');
          });
          throw error;
        }
      });

      this.logger?.info({ assetType, oldName, newName, slotsUpdated: changed }, 'Asset renamed');
      return newName;
    });
  }

  async remove(assetType: AssetType, name: string): Promise<void> {
    if (!isSafeAssetName(name)) {
      throw new NotFoundError(`Asset not found: ${name}`);
    }

    await this.locks.run([lockKey(assetType, name)], async () => {
      if (!(await this.assets.exists(assetType, name))) {
        throw new NotFoundError(`Asset not found: ${name}`);
      }

      if (assetType === 'music') {
        await this.playback.unload();
      }

      // The file is parked under a hidden name until the references are gone,
      // so a failed registry write can put it back.
      const parkedName = `.${name}.${randomUUID()}.deleting`;
      const cleared = await this.registry.exclusive(async (session) => {
        await this.assets.rename(assetType, name, parkedName);
        try {
          return await session.clearReferences(assetType, name);
        } catch (error) {
          await this.assets.rename(assetType, parkedName, name).catch((rollbackError: unknown) => {
            this.logger?.error({ err: rollbackError, assetType, name }, 'Could not restore asset after failed delete');
          });
          throw error;
        }
      });

      await this.assets.remove(assetType, parkedName).catch((error: unknown) => {
        this.logger?.warn({ err: error, assetType, name, parkedName }, 'Could not remove parked asset file');
      });

      this.logger?.info({ assetType, name, slotsCleared: cleared }, 'Asset deleted');
    });
  }

  /** Maps assets onto a slot after checking every referenced file exists. */
  async assignSlot(slotId: number, patch: SlotPatch): Promise<Slot> {
    const references: Array<[AssetType, string]> = [];
    if (typeof patch.filename === 'string') {
      references.push(['music', patch.filename]);
    }
    if (typeof patch.icon === 'string') {
      references.push(['icon', patch.icon]);
    }

    const keys = references.map(([assetType, name]) => lockKey(assetType, name));
    return this.locks.run(keys, () =>
      this.registry.exclusive(async (session) => {
        for (const [assetType, name] of references) {
          if (!isSafeAssetName(name) || !(await this.assets.exists(assetType, name))) {
            throw new AssetNotFoundError(name);
          }
        }
        return session.updateSlot(slotId, patch);
      }),
    );
  }

  unassignSlot(slotId: number): Promise<Slot> {
    return this.registry.clearSlot(slotId);
  }
}
