import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { mkdir, readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';

import { createSoundboardDirectories, removeTempDir, writeAsset, type SoundboardDirectories } from '../test/fixtures';
import { FileSystemAssetStore } from './assetStore';

describe('file system asset store', () => {
  let dirs: SoundboardDirectories;
  let store: FileSystemAssetStore;

  beforeEach(async () => {
    dirs = await createSoundboardDirectories();
    store = new FileSystemAssetStore(dirs);
  });

  afterEach(async () => {
    await removeTempDir(dirs.root);
  });

  test('lists only supported files of each type in sorted order', async () => {
    await writeAsset(dirs.musicDir, 'zeta.mp3');
    await writeAsset(dirs.musicDir, 'alpha.wav');
    await writeAsset(dirs.musicDir, 'notes.txt');
    await writeAsset(dirs.iconDir, 'shield.png');
    await mkdir(path.join(dirs.musicDir, 'folder.mp3'));

    expect(await store.list('music')).toEqual(['alpha.wav', 'zeta.mp3']);
    expect(await store.list('icon')).toEqual(['shield.png']);
  });

  test('reports existence per asset type', async () => {
    await writeAsset(dirs.iconDir, 'crown.png');

    expect(await store.exists('icon', 'crown.png')).toBe(true);
    expect(await store.exists('music', 'crown.png')).toBe(false);
  });

  test('writes buffers and streams without leaving temporary files', async () => {
    await store.write('music', 'chime.mp3', new Uint8Array([1, 2, 3]));
    await store.write('icon', 'bell.png', Readable.from([Buffer.from('icon-'), Buffer.from('bytes')]));

    expect([...(await readFile(path.join(dirs.musicDir, 'chime.mp3')))]).toEqual([1, 2, 3]);
    expect(await readFile(path.join(dirs.iconDir, 'bell.png'), 'utf8')).toBe('icon-bytes');
    expect(await readdir(dirs.musicDir)).toEqual(['chime.mp3']);
    expect(await readdir(dirs.iconDir)).toEqual(['bell.png']);
  });

  test('does not publish a partial upload when the source stream fails', async () => {
    const failing = new Readable({
      read() {
        this.destroy(new Error('connection reset'));
      },
    });

    await expect(store.write('music', 'broken.mp3', failing)).rejects.toThrow('connection reset');
    expect(await store.exists('music', 'broken.mp3')).toBe(false);
    expect(await store.list('music')).toEqual([]);
  });

  test('renames and removes files in place', async () => {
    await writeAsset(dirs.musicDir, 'old.mp3', 'song');

    await store.rename('music', 'old.mp3', 'new.mp3');
    expect(await readFile(store.resolvePath('music', 'new.mp3'), 'utf8')).toBe('song');
    expect(await store.exists('music', 'old.mp3')).toBe(false);

    await store.remove('music', 'new.mp3');
    expect(await store.list('music')).toEqual([]);
  });
});
