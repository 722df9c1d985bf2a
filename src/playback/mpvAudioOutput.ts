import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { createConnection, type Socket } from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';

import { PlaybackDeviceError, errorMessage } from '../errors/soundboardErrors';
import type { PlayOptions } from '../types/playback';
import type { AudioOutput } from './audioOutput';

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_COMMAND_TIMEOUT_MS = 5_000;
const CONNECT_RETRY_MS = 50;

/** The part of a child process the output watches. */
export interface PlayerProcess {
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  kill(): boolean;
}

export type SpawnPlayer = (binary: string, args: string[]) => PlayerProcess;

export interface MpvAudioOutputOptions {
  binary?: string;
  socketPath?: string;
  connectTimeoutMs?: number;
  /** How long a single IPC command may go unanswered. */
  commandTimeoutMs?: number;
  spawnPlayer?: SpawnPlayer;
  logger?: Logger;
}

interface PendingRequest {
  command: string;
  timer: NodeJS.Timeout;
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
}

function defaultSocketPath(): string {
  const name = `bardbox-mpv-${process.pid}-${randomUUID()}`;
  return process.platform === 'win32' ? `\\\\.\\pipe\\${name}` : path.join(os.tmpdir(), `${name}.sock`);
}

function defaultSpawnPlayer(binary: string, args: string[]): PlayerProcess {
  return spawn(binary, args, { stdio: 'ignore' });
}

function connectSocket(socketPath: string): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(socketPath);
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.off('error', reject);
      resolve(socket);
    });
  });
}

/**
 * Drives an idle `mpv` process over its JSON IPC socket. One track at a time;
 * `loadfile ... replace` swaps the current track.
 */
export class MpvAudioOutput implements AudioOutput {
  private readonly binary: string;
  private readonly socketPath: string;
  private readonly connectTimeoutMs: number;
  private readonly commandTimeoutMs: number;
  private readonly spawnPlayer: SpawnPlayer;
  private readonly logger?: Logger;

  private child?: PlayerProcess;
  private socket?: Socket;
  private childFailure?: PlaybackDeviceError;
  private buffered = '';
  private nextRequestId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly closedListeners: Array<() => void> = [];

  constructor(options: MpvAudioOutputOptions = {}) {
    this.binary = options.binary ?? 'mpv';
    this.socketPath = options.socketPath ?? defaultSocketPath();
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.spawnPlayer = options.spawnPlayer ?? defaultSpawnPlayer;
    this.logger = options.logger;
  }

  async open(): Promise<void> {
    if (this.socket) {
      return;
    }

    this.childFailure = undefined;
    const child = this.spawnPlayer(this.binary, [
      '--idle=yes',
      '--no-video',
      '--no-terminal',
      `--input-ipc-server=${this.socketPath}`,
    ]);
    this.child = child;

    child.once('error', (error: Error) => {
      this.childFailure = new PlaybackDeviceError(`Could not start ${this.binary}: ${error.message}`, { cause: error });
    });
    child.once('exit', (code: number | null) => {
      this.childFailure = new PlaybackDeviceError(`${this.binary} exited with code ${code ?? 'unknown'}.`);
      if (this.child !== child) {
        return;
      }
      this.logger?.warn({ binary: this.binary, code }, 'Audio player exited');
      this.child = undefined;
      const socket = this.socket;
      this.socket = undefined;
      socket?.destroy();
      this.notifyClosed();
    });

    try {
      this.attach(await this.connect());
    } catch (error) {
      child.kill();
      this.child = undefined;
      throw error;
    }

    this.logger?.info({ binary: this.binary, socketPath: this.socketPath }, 'Audio output ready');
  }

  async play(filePath: string, options: PlayOptions): Promise<void> {
    await this.command(['set_property', 'loop-file', options.loop ? 'inf' : 'no']);
    await this.command(['loadfile', filePath, 'replace']);
    await this.command(['set_property', 'pause', false]);
  }

  // With no player running nothing is loaded, so there is nothing to stop.
  async stop(): Promise<void> {
    if (!this.socket) {
      return;
    }
    await this.command(['stop']);
  }

  async setVolume(level: number): Promise<void> {
    await this.command(['set_property', 'volume', Math.round(level * 100)]);
  }

  async unload(): Promise<void> {
    if (!this.socket) {
      return;
    }
    await this.command(['stop']);
    await this.command(['playlist-clear']);
  }

  async close(): Promise<void> {
    const { socket, child } = this;
    this.socket = undefined;
    this.child = undefined;
    socket?.destroy();
    child?.kill();
  }

  onClosed(listener: () => void): void {
    this.closedListeners.push(listener);
  }

  private async connect(): Promise<Socket> {
    const deadline = Date.now() + this.connectTimeoutMs;
    let lastError: unknown;

    while (Date.now() < deadline) {
      if (this.childFailure) {
        throw this.childFailure;
      }
      try {
        return await connectSocket(this.socketPath);
      } catch (error) {
        lastError = error;
        await delay(CONNECT_RETRY_MS);
      }
    }

    throw this.childFailure ??
      new PlaybackDeviceError(`mpv IPC socket did not come up within ${this.connectTimeoutMs}ms.`, {
        cause: lastError,
      });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.buffered = '';
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('error', (error: Error) => {
      this.logger?.warn({ err: error }, 'Audio output socket error');
    });
    socket.on('close', () => {
      this.rejectPending(new PlaybackDeviceError('Audio output connection closed.'));
      if (this.socket === socket) {
        this.socket = undefined;
        this.logger?.warn('Audio output connection lost');
        this.notifyClosed();
      }
    });
  }

  private command(args: Array<string | number | boolean>): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new PlaybackDeviceError('Audio output is not open.'));
    }

    const requestId = this.nextRequestId;
    this.nextRequestId += 1;
    const command = String(args[0]);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new PlaybackDeviceError(`mpv did not answer ${command} within ${this.commandTimeoutMs}ms.`));
      }, this.commandTimeoutMs);
      this.pending.set(requestId, { command, timer, resolve, reject });
      socket.write(`${JSON.stringify({ command: args, request_id: requestId })}\n`);
    });
  }

  private handleData(chunk: string): void {
    this.buffered += chunk;
    let newline = this.buffered.indexOf('\n');
    while (newline >= 0) {
      const line = this.buffered.slice(0, newline).trim();
      this.buffered = this.buffered.slice(newline + 1);
      if (line) {
        this.handleLine(line);
      }
      newline = this.buffered.indexOf('\n');
    }
  }

  private handleLine(line: string): void {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (error) {
      this.logger?.warn({ line, reason: errorMessage(error) }, 'Unparseable audio output message');
      return;
    }

    // Property-change and playback events carry no request id.
    if (typeof message !== 'object' || message === null || !('request_id' in message)) {
      return;
    }
    const requestId = message.request_id;
    if (typeof requestId !== 'number') {
      return;
    }

    const request = this.pending.get(requestId);
    if (!request) {
      return;
    }
    this.pending.delete(requestId);
    clearTimeout(request.timer);

    const status = 'error' in message ? message.error : undefined;
    if (status === 'success') {
      request.resolve('data' in message ? message.data : undefined);
      return;
    }
    request.reject(new PlaybackDeviceError(`mpv rejected ${request.command}: ${String(status)}`));
  }

  private notifyClosed(): void {
    for (const listener of this.closedListeners) {
      listener();
    }
  }

  private rejectPending(error: PlaybackDeviceError): void {
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(error);
    }
    this.pending.clear();
  }
}
