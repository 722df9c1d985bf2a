import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import path from 'node:path';

import { PlaybackDeviceError } from '../errors/soundboardErrors';
import { FakePlayerProcess, startFakeIpcServer, type FakeIpcServer } from '../test/fakeMpv';
import { createTempDir, removeTempDir } from '../test/fixtures';
import { MpvAudioOutput, type SpawnPlayer } from './mpvAudioOutput';

describe('mpv audio output', () => {
  let root: string;
  let socketPath: string;
  let spawned: Array<{ binary: string; args: string[]; child: FakePlayerProcess }>;
  let spawnPlayer: SpawnPlayer;
  let server: FakeIpcServer | undefined;

  beforeEach(async () => {
    root = await createTempDir();
    socketPath = path.join(root, 'mpv.sock');
    spawned = [];
    spawnPlayer = (binary, args) => {
      const child = new FakePlayerProcess();
      spawned.push({ binary, args, child });
      return child;
    };
  });

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
    await removeTempDir(root);
  });

  test('spawns an idle player and drives it over the IPC socket', async () => {
    server = await startFakeIpcServer(socketPath);
    const output = new MpvAudioOutput({ binary: 'mpv-test', socketPath, spawnPlayer });

    await output.open();
    await output.play('/music/tavern.mp3', { loop: true });
    await output.setVolume(0.42);
    await output.unload();
    await output.close();

    expect(spawned).toHaveLength(1);
    expect(spawned[0].binary).toBe('mpv-test');
    expect(spawned[0].args).toEqual([
      '--idle=yes',
      '--no-video',
      '--no-terminal',
      `--input-ipc-server=${socketPath}`,
    ]);
    expect(server.received.map((message) => message.command)).toEqual([
      ['set_property', 'loop-file', 'inf'],
      ['loadfile', '/music/tavern.mp3', 'replace'],
      ['set_property', 'pause', false],
      ['set_property', 'volume', 42],
      ['stop'],
      ['playlist-clear'],
    ]);
    expect(server.received.map((message) => message.request_id)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(spawned[0].child.killed).toBe(true);
  });

  test('a rejected command surfaces as a playback device error', async () => {
    server = await startFakeIpcServer(socketPath, { failing: 'loadfile' });
    const output = new MpvAudioOutput({ socketPath, spawnPlayer });
    await output.open();

    await expect(output.play('/music/missing.mp3', { loop: false })).rejects.toThrow(
      'mpv rejected loadfile: invalid parameter',
    );
    await output.close();
  });

  test('an unanswered command times out instead of hanging', async () => {
    server = await startFakeIpcServer(socketPath, { unresponsive: true });
    const output = new MpvAudioOutput({ socketPath, spawnPlayer, commandTimeoutMs: 100 });
    await output.open();

    await expect(output.stop()).rejects.toThrow(new PlaybackDeviceError('mpv did not answer stop within 100ms.'));
    await expect(output.setVolume(0.5)).rejects.toBeInstanceOf(PlaybackDeviceError);
    expect(server.received.map((message) => message.command)).toEqual([['stop'], ['set_property', 'volume', 50]]);
    await output.close();
  });

  test('a player that exits mid-session reports closure and stops holding files', async () => {
    server = await startFakeIpcServer(socketPath);
    const output = new MpvAudioOutput({ socketPath, spawnPlayer });
    let closures = 0;
    output.onClosed(() => {
      closures += 1;
    });
    await output.open();
    await output.play('/music/tavern.mp3', { loop: true });

    spawned[0].child.emit('exit', 1);

    expect(closures).toBe(1);
    await expect(output.unload()).resolves.toBeUndefined();
    await expect(output.stop()).resolves.toBeUndefined();
    await expect(output.play('/music/tavern.mp3', { loop: true })).rejects.toThrow('Audio output is not open.');
    expect(server.received).toHaveLength(3);
  });

  test('closing the output on purpose does not report closure', async () => {
    server = await startFakeIpcServer(socketPath);
    const output = new MpvAudioOutput({ socketPath, spawnPlayer });
    let closures = 0;
    output.onClosed(() => {
      closures += 1;
    });
    await output.open();

    await output.close();
    spawned[0].child.emit('exit', 0);

    expect(closures).toBe(0);
  });

  test('open fails when the player never creates its socket', async () => {
    const output = new MpvAudioOutput({ socketPath, spawnPlayer, connectTimeoutMs: 150 });

    await expect(output.open()).rejects.toBeInstanceOf(PlaybackDeviceError);
    expect(spawned[0].child.killed).toBe(true);
  });

  test('open fails fast when the player binary cannot start', async () => {
    const output = new MpvAudioOutput({
      socketPath,
      spawnPlayer: (binary, args) => {
        const child = spawnPlayer(binary, args);
        queueMicrotask(() => spawned[0].child.emit('error', new Error('spawn mpv ENOENT')));
        return child;
      },
    });

    await expect(output.open()).rejects.toThrow('Could not start mpv: spawn mpv ENOENT');
  });

  test('play fails before the output is opened', async () => {
    const output = new MpvAudioOutput({ socketPath, spawnPlayer });

    await expect(output.play('/music/tavern.mp3', { loop: true })).rejects.toThrow('Audio output is not open.');
  });
});
