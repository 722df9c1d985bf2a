import type { Logger } from 'pino';

import { AssetLifecycle } from '../assets/assetLifecycle';
import { FileSystemAssetStore } from '../assets/assetStore';
import type { ServerConfig } from '../config/serverConfig';
import { componentLogger } from '../logging/logger';
import { SilentAudioOutput, type AudioOutput } from '../playback/audioOutput';
import { MpvAudioOutput } from '../playback/mpvAudioOutput';
import { PlaybackController } from '../playback/playbackController';
import { MappingRegistry } from '../storage/mappingRegistry';

export interface Soundboard {
  assets: FileSystemAssetStore;
  registry: MappingRegistry;
  playback: PlaybackController;
  lifecycle: AssetLifecycle;
}

export function createAudioOutput(
  config: Pick<ServerConfig, 'audioOutput' | 'mpvPath'>,
  logger: Logger,
): AudioOutput {
  const outputLogger = componentLogger(logger, 'audio-output');
  if (config.audioOutput === 'silent') {
    return new SilentAudioOutput(outputLogger);
  }
  return new MpvAudioOutput({ binary: config.mpvPath, logger: outputLogger });
}

export function createSoundboard(
  config: Pick<ServerConfig, 'musicDir' | 'iconDir' | 'mappingFile'>,
  logger: Logger,
  output: AudioOutput,
): Soundboard {
  const assets = new FileSystemAssetStore({ musicDir: config.musicDir, iconDir: config.iconDir });
  const registry = new MappingRegistry({
    filePath: config.mappingFile,
    logger: componentLogger(logger, 'registry'),
  });
  const playback = new PlaybackController({
    output,
    assets,
    logger: componentLogger(logger, 'playback'),
  });
  const lifecycle = new AssetLifecycle({
    assets,
    registry,
    playback,
    logger: componentLogger(logger, 'assets'),
  });

  return { assets, registry, playback, lifecycle };
}
