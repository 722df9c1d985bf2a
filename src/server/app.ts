import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import Fastify from 'fastify';
import type { Logger } from 'pino';

import type { AssetLifecycle } from '../assets/assetLifecycle';
import { parseAssetType } from '../assets/assetNames';
import { APP_NAME, type ServerConfig } from '../config/serverConfig';
import { InvalidRequestError, isSoundboardError } from '../errors/soundboardErrors';
import { renderSoundboardDocument } from '../pages/SoundboardPage';
import type { PlaybackController } from '../playback/playbackController';
import type { AssetType } from '../types/assets';
import type { SlotPatch } from '../types/slots';

export interface SoundboardServices {
  lifecycle: AssetLifecycle;
  playback: PlaybackController;
}

export interface BuildAppOptions {
  config: Pick<ServerConfig, 'staticDir' | 'maxUploadBytes'>;
  services: SoundboardServices;
  logger?: Logger;
}

interface RenameAssetBody {
  type: string;
  old_name: string;
  new_name: string;
}

interface DeleteAssetBody {
  type: string;
  filename: string;
}

interface MapSlotBody {
  slot_id: number;
  filename?: string | null;
  label?: string | null;
  icon?: string | null;
}

const assetTypeSchema = { type: 'string', enum: ['music', 'icon', 'icons'] } as const;
const nullableString = { type: ['string', 'null'] } as const;

const renameAssetSchema = {
  body: {
    type: 'object',
    required: ['type', 'old_name', 'new_name'],
    properties: {
      type: assetTypeSchema,
      old_name: { type: 'string', minLength: 1 },
      new_name: { type: 'string', minLength: 1 },
    },
  },
};

const deleteAssetSchema = {
  body: {
    type: 'object',
    required: ['type', 'filename'],
    properties: {
      type: assetTypeSchema,
      filename: { type: 'string', minLength: 1 },
    },
  },
};

const mapSlotSchema = {
  body: {
    type: 'object',
    required: ['slot_id'],
    properties: {
      slot_id: { type: 'integer' },
      filename: nullableString,
      label: nullableString,
      icon: nullableString,
    },
  },
};

function requireAssetType(value: string): AssetType {
  const assetType = parseAssetType(value);
  if (!assetType) {
    throw new InvalidRequestError(`Unknown asset type: ${value}`);
  }
  return assetType;
}

function toSlotPatch(body: MapSlotBody): SlotPatch {
  const patch: SlotPatch = {};
  if (body.filename !== undefined) {
    patch.filename = body.filename;
  }
  if (body.label !== undefined) {
    patch.label = body.label;
  }
  if (body.icon !== undefined) {
    patch.icon = body.icon;
  }
  return patch;
}

export type SoundboardApp = Awaited<ReturnType<typeof buildApp>>;

export async function buildApp({ config, services, logger }: BuildAppOptions) {
  const { lifecycle, playback } = services;
  const app = Fastify({ logger: logger ?? false });

  app.setErrorHandler((error, request, reply) => {
    if (isSoundboardError(error)) {
      request.log.warn({ kind: error.kind }, error.message);
      return reply.code(error.statusCode).send({ status: 'error', message: error.message });
    }
    if (error.validation || (error.statusCode !== undefined && error.statusCode < 500)) {
      return reply.code(error.statusCode ?? 400).send({ status: 'error', message: error.message });
    }
    request.log.error({ err: error }, 'Unhandled request error');
    return reply.code(500).send({ status: 'error', message: 'Internal server error' });
  });

  await app.register(multipart, {
    limits: {
      files: 1,
      fileSize: config.maxUploadBytes,
    },
  });
  await app.register(fastifyStatic, {
    root: config.staticDir,
    prefix: '/static/',
  });

  app.get('/', async (_request, reply) => {
    const catalog = await lifecycle.catalog();
    const html = renderSoundboardDocument({
      title: APP_NAME,
      ...catalog,
      playback: playback.getState(),
    });
    return reply.type('text/html; charset=utf-8').send(html);
  });

  app.get('/api/data', async () => {
    const catalog = await lifecycle.catalog();
    return {
      ...catalog,
      playback: playback.getState(),
    };
  });

  app.get<{ Params: { filename: string } }>('/api/play/:filename', async (request) => {
    await playback.play(request.params.filename);
    return { status: 'playing' };
  });

  app.get('/api/stop', async () => {
    await playback.stop();
    return { status: 'stopped' };
  });

  app.get<{ Params: { level: number } }>(
    '/api/volume/:level',
    {
      schema: {
        params: {
          type: 'object',
          required: ['level'],
          properties: { level: { type: 'number' } },
        },
      },
    },
    async (request) => {
      const level = await playback.setVolume(request.params.level);
      return { status: 'volume_set', level };
    },
  );

  app.post<{ Body: RenameAssetBody }>('/api/rename_asset', { schema: renameAssetSchema }, async (request) => {
    const { type, old_name: oldName, new_name: newBase } = request.body;
    const newName = await lifecycle.rename(requireAssetType(type), oldName, newBase);
    return { status: 'renamed', new_name: newName };
  });

  app.post<{ Body: MapSlotBody }>('/api/map', { schema: mapSlotSchema }, async (request) => {
    const slot = await lifecycle.assignSlot(request.body.slot_id, toSlotPatch(request.body));
    return { status: 'mapped', slot };
  });

  app.post<{ Params: { slotId: number } }>(
    '/api/unmap/:slotId',
    {
      schema: {
        params: {
          type: 'object',
          required: ['slotId'],
          properties: { slotId: { type: 'integer' } },
        },
      },
    },
    async (request) => {
      const slot = await lifecycle.unassignSlot(request.params.slotId);
      return { status: 'unmapped', slot };
    },
  );

  const registerUpload = (url: string, assetType: AssetType): void => {
    app.post(url, async (request) => {
      if (!request.isMultipart()) {
        throw new InvalidRequestError('Expected a multipart upload.');
      }
      const file = await request.file();
      if (!file || !file.filename) {
        throw new InvalidRequestError('No file provided.');
      }
      try {
        const filename = await lifecycle.upload(assetType, file.filename, file.file);
        return { status: 'uploaded', filename };
      } catch (error) {
        // Drain the part so the multipart parser can finish the request.
        file.file.resume();
        throw error;
      }
    });
  };
  registerUpload('/api/upload_music', 'music');
  registerUpload('/api/upload_icon', 'icon');

  app.post<{ Body: DeleteAssetBody }>('/api/delete_asset', { schema: deleteAssetSchema }, async (request) => {
    await lifecycle.remove(requireAssetType(request.body.type), request.body.filename);
    return { status: 'deleted' };
  });

  return app;
}
