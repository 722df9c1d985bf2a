import type { Logger } from 'pino';

import type { PlayOptions } from '../types/playback';

/** A single process-wide audio output. Only the playback controller drives it. */
export interface AudioOutput {
  open(): Promise<void>;
  play(filePath: string, options: PlayOptions): Promise<void>;
  stop(): Promise<void>;
  /** Level in [0, 1]. */
  setVolume(level: number): Promise<void>;
  /** Releases any handle on the current file. */
  unload(): Promise<void>;
  close(): Promise<void>;
  /** Called when the device goes away on its own, not through `close`. */
  onClosed(listener: () => void): void;
}

export type AudioOutputCommand =
  | { type: 'open' }
  | { type: 'play'; filePath: string; loop: boolean }
  | { type: 'stop' }
  | { type: 'setVolume'; level: number }
  | { type: 'unload' }
  | { type: 'close' };

/** Accepts every command without producing sound; used on hosts with no player. */
export class SilentAudioOutput implements AudioOutput {
  readonly commands: AudioOutputCommand[] = [];
  private readonly closedListeners: Array<() => void> = [];

  constructor(private readonly logger?: Logger) {}

  async open(): Promise<void> {
    this.record({ type: 'open' });
  }

  async play(filePath: string, options: PlayOptions): Promise<void> {
    this.record({ type: 'play', filePath, loop: options.loop });
  }

  async stop(): Promise<void> {
    this.record({ type: 'stop' });
  }

  async setVolume(level: number): Promise<void> {
    this.record({ type: 'setVolume', level });
  }

  async unload(): Promise<void> {
    this.record({ type: 'unload' });
  }

  async close(): Promise<void> {
    this.record({ type: 'close' });
  }

  onClosed(listener: () => void): void {
    this.closedListeners.push(listener);
  }

  /** Behaves like a device that disappeared mid-session. */
  disconnect(): void {
    for (const listener of this.closedListeners) {
      listener();
    }
  }

  private record(command: AudioOutputCommand): void {
    this.commands.push(command);
    this.logger?.debug({ command }, 'Silent audio output command');
  }
}
