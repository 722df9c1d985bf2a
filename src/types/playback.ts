export type PlaybackStatus = 'stopped' | 'playing';

export interface PlaybackSnapshot {
  status: PlaybackStatus;
  track: string | null;
  volume: number;
}

export interface PlayOptions {
  loop: boolean;
}
