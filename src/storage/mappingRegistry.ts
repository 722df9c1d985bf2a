import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';

import { NotFoundError, StorageUnavailableError } from '../errors/soundboardErrors';
import type { AssetType } from '../types/assets';
import { SLOT_COUNT, type MappingDocument, type Slot, type SlotPatch } from '../types/slots';
import { SerialQueue } from '../utils/serialQueue';

const JSON_INDENT = 4;

type ReferenceField = 'filename' | 'icon';

export function defaultSlotLabel(slotId: number): string {
  return `Slot ${slotId}`;
}

export function slotIds(): number[] {
  return Array.from({ length: SLOT_COUNT }, (_, index) => index + 1);
}

export function isSlotId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= SLOT_COUNT;
}

export function createDefaultSlot(slotId: number): Slot {
  return {
    id: slotId,
    label: defaultSlotLabel(slotId),
    filename: null,
    icon: null,
  };
}

export function createDefaultMappingDocument(): MappingDocument {
  return {
    slots: slotIds().map(createDefaultSlot),
  };
}

function normalizeSlot(slotId: number, input: unknown): Slot {
  const fallback = createDefaultSlot(slotId);
  if (typeof input !== 'object' || input === null) {
    return fallback;
  }

  return {
    id: slotId,
    label: 'label' in input && typeof input.label === 'string' ? input.label : fallback.label,
    filename: 'filename' in input && typeof input.filename === 'string' ? input.filename : null,
    icon: 'icon' in input && typeof input.icon === 'string' ? input.icon : null,
  };
}

/**
 * Coerces a parsed document into exactly slots 1..8 in id order. Missing slots
 * and mistyped fields take their defaults; unknown ids are dropped.
 */
export function normalizeMappingDocument(input: unknown): MappingDocument {
  if (typeof input !== 'object' || input === null || !('slots' in input) || !Array.isArray(input.slots)) {
    throw new StorageUnavailableError('Mapping document has no slots list.');
  }

  const entries: unknown[] = input.slots;
  const entriesById = new Map<number, unknown>();
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null || !('id' in entry)) {
      continue;
    }
    const { id } = entry;
    if (isSlotId(id) && !entriesById.has(id)) {
      entriesById.set(id, entry);
    }
  }

  return {
    slots: slotIds().map((slotId) => normalizeSlot(slotId, entriesById.get(slotId))),
  };
}

function cloneDocument(document: MappingDocument): MappingDocument {
  return {
    slots: document.slots.map((slot) => ({ ...slot })),
  };
}

function referenceField(assetType: AssetType): ReferenceField {
  return assetType === 'music' ? 'filename' : 'icon';
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function findSlot(document: MappingDocument, slotId: number): Slot {
  const slot = isSlotId(slotId) ? document.slots.find((candidate) => candidate.id === slotId) : undefined;
  if (!slot) {
    throw new NotFoundError(`Slot ${slotId} does not exist.`);
  }
  return slot;
}

/** Registry operations available while the registry lock is held. */
export interface RegistrySession {
  load(): Promise<MappingDocument>;
  save(document: MappingDocument): Promise<void>;
  updateSlot(slotId: number, patch: SlotPatch): Promise<Slot>;
  clearSlot(slotId: number): Promise<Slot>;
  renameReferences(assetType: AssetType, oldName: string, newName: string): Promise<number>;
  clearReferences(assetType: AssetType, name: string): Promise<number>;
}

export interface MappingRegistryOptions {
  filePath: string;
  logger?: Logger;
}

class MappingFileSession implements RegistrySession {
  constructor(
    private readonly filePath: string,
    private readonly logger?: Logger,
  ) {}

  async load(): Promise<MappingDocument> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw new StorageUnavailableError(`Could not read mapping document at ${this.filePath}.`, { cause: error });
      }

      const created = createDefaultMappingDocument();
      await this.save(created);
      this.logger?.info({ filePath: this.filePath }, 'Created default mapping document');
      return created;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageUnavailableError(`Mapping document at ${this.filePath} is not valid JSON.`, { cause: error });
    }

    return normalizeMappingDocument(parsed);
  }

  async save(document: MappingDocument): Promise<void> {
    const payload = `${JSON.stringify(normalizeMappingDocument(cloneDocument(document)), null, JSON_INDENT)}\n`;
    const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, payload, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.warn({ err: cleanupError, tempPath }, 'Could not remove temporary mapping file');
      });
      throw new StorageUnavailableError(`Could not write mapping document at ${this.filePath}.`, { cause: error });
    }
  }

  async updateSlot(slotId: number, patch: SlotPatch): Promise<Slot> {
    const document = await this.load();
    const slot = findSlot(document, slotId);

    if (patch.filename !== undefined) {
      slot.filename = patch.filename;
    }
    if (patch.label !== undefined) {
      slot.label = patch.label ?? defaultSlotLabel(slot.id);
    }
    if (patch.icon !== undefined) {
      slot.icon = patch.icon;
    }

    await this.save(document);
    this.logger?.info({ slot }, 'Slot mapping updated');
    return { ...slot };
  }

  async clearSlot(slotId: number): Promise<Slot> {
    const document = await this.load();
    const slot = findSlot(document, slotId);

    slot.filename = null;
    slot.icon = null;
    slot.label = defaultSlotLabel(slot.id);

    await this.save(document);
    this.logger?.info({ slotId: slot.id }, 'Slot mapping cleared');
    return { ...slot };
  }

  async renameReferences(assetType: AssetType, oldName: string, newName: string): Promise<number> {
    const field = referenceField(assetType);
    const document = await this.load();
    let changed = 0;

    for (const slot of document.slots) {
      if (slot[field] === oldName) {
        slot[field] = newName;
        changed += 1;
      }
    }

    await this.save(document);
    return changed;
  }

  async clearReferences(assetType: AssetType, name: string): Promise<number> {
    const field = referenceField(assetType);
    const document = await this.load();
    let changed = 0;

    for (const slot of document.slots) {
      if (slot[field] === name) {
        slot[field] = null;
        changed += 1;
      }
    }

    await this.save(document);
    return changed;
  }
}

/**
 * Owns the persisted slot mapping. Every operation is a full load-mutate-save
 * cycle under one lock; `exclusive` extends that lock over caller work such as
 * the file rename a reference update belongs to.
 */
export class MappingRegistry {
  private readonly queue = new SerialQueue();
  private readonly session: RegistrySession;

  constructor(options: MappingRegistryOptions) {
    this.session = new MappingFileSession(options.filePath, options.logger);
  }

  exclusive<T>(task: (session: RegistrySession) => Promise<T> | T): Promise<T> {
    return this.queue.run(() => task(this.session));
  }

  load(): Promise<MappingDocument> {
    return this.exclusive((session) => session.load());
  }

  save(document: MappingDocument): Promise<void> {
    return this.exclusive((session) => session.save(document));
  }

  updateSlot(slotId: number, patch: SlotPatch): Promise<Slot> {
    return this.exclusive((session) => session.updateSlot(slotId, patch));
  }

  clearSlot(slotId: number): Promise<Slot> {
    return this.exclusive((session) => session.clearSlot(slotId));
  }

  renameReferences(assetType: AssetType, oldName: string, newName: string): Promise<number> {
    return this.exclusive((session) => session.renameReferences(assetType, oldName, newName));
  }

  clearReferences(assetType: AssetType, name: string): Promise<number> {
    return this.exclusive((session) => session.clearReferences(assetType, name));
  }
}
