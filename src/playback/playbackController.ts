import type { Logger } from 'pino';
import { createStore, type StoreApi } from 'zustand/vanilla';

import type { AssetStore } from '../assets/assetStore';
import { isSafeAssetName } from '../assets/assetNames';
import { AssetNotFoundError, InvalidRequestError } from '../errors/soundboardErrors';
import type { PlaybackSnapshot } from '../types/playback';
import { SerialQueue } from '../utils/serialQueue';
import type { AudioOutput } from './audioOutput';

export const DEFAULT_VOLUME = 1;

export type PlaybackStore = StoreApi<PlaybackSnapshot>;

export function createPlaybackStore(): PlaybackStore {
  return createStore<PlaybackSnapshot>(() => ({
    status: 'stopped',
    track: null,
    volume: DEFAULT_VOLUME,
  }));
}

export function clampVolume(level: number): number {
  return Math.max(0, Math.min(1, level));
}

export interface PlaybackControllerOptions {
  output: AudioOutput;
  assets: AssetStore;
  logger?: Logger;
}

/**
 * Sole owner of the audio output. Transitions run one at a time in call order,
 * so concurrent requests settle on the state of the last one submitted.
 */
export class PlaybackController {
  readonly store: PlaybackStore;

  private readonly output: AudioOutput;
  private readonly assets: AssetStore;
  private readonly logger?: Logger;
  private readonly queue = new SerialQueue();

  constructor(options: PlaybackControllerOptions) {
    this.output = options.output;
    this.assets = options.assets;
    this.store = createPlaybackStore();
    this.logger = options.logger;
    this.output.onClosed(() => {
      if (this.store.getState().status === 'playing') {
        this.logger?.warn({ track: this.store.getState().track }, 'Audio output closed during playback');
      }
      this.store.setState({ status: 'stopped', track: null });
    });
  }

  getState(): PlaybackSnapshot {
    return { ...this.store.getState() };
  }

  /** Opens the output device and applies the current volume. Failure here is fatal to the service. */
  initialize(): Promise<void> {
    return this.queue.run(async () => {
      await this.output.open();
      await this.output.setVolume(this.store.getState().volume);
    });
  }

  shutdown(): Promise<void> {
    return this.queue.run(async () => {
      await this.output.close();
      this.store.setState({ status: 'stopped', track: null });
    });
  }

  play(track: string): Promise<void> {
    return this.queue.run(async () => {
      if (!isSafeAssetName(track) || !(await this.assets.exists('music', track))) {
        this.logger?.error({ track }, 'File not found');
        throw new AssetNotFoundError(track);
      }

      await this.output.play(this.assets.resolvePath('music', track), { loop: true });
      this.store.setState({ status: 'playing', track });
      this.logger?.info({ track }, 'Playback started');
    });
  }

  stop(): Promise<void> {
    return this.queue.run(async () => {
      await this.output.stop();
      this.store.setState({ status: 'stopped', track: null });
    });
  }

  setVolume(level: number): Promise<number> {
    if (!Number.isFinite(level)) {
      return Promise.reject(new InvalidRequestError(`Volume must be a finite number, got ${level}.`));
    }

    const clamped = clampVolume(level);
    return this.queue.run(async () => {
      await this.output.setVolume(clamped);
      this.store.setState({ volume: clamped });
      return clamped;
    });
  }

  unload(): Promise<void> {
    return this.queue.run(() => this.unloadNow());
  }

  /** Unloads only when `track` is the one currently playing. */
  releaseIfPlaying(track: string): Promise<boolean> {
    return this.queue.run(async () => {
      const state = this.store.getState();
      if (state.status !== 'playing' || state.track !== track) {
        return false;
      }
      await this.unloadNow();
      return true;
    });
  }

  private async unloadNow(): Promise<void> {
    await this.output.unload();
    this.store.setState({ status: 'stopped', track: null });
  }
}
