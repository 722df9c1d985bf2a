import type { AssetType, IconExtension, MusicExtension } from '../types/assets';

export const MUSIC_EXTENSIONS: readonly MusicExtension[] = ['.mp3', '.wav'];
export const ICON_EXTENSIONS: readonly IconExtension[] = ['.png', '.jpg', '.jpeg', '.webp'];

export function extensionsFor(assetType: AssetType): readonly string[] {
  return assetType === 'music' ? MUSIC_EXTENSIONS : ICON_EXTENSIONS;
}

export function getAssetExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(dot) : '';
}

export function isSupportedAssetFileName(assetType: AssetType, fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return extensionsFor(assetType).some((extension) => lower.endsWith(extension));
}

/** A single path segment: no separators, no dot entries, no NUL bytes. */
export function isSafeAssetName(fileName: string): boolean {
  if (fileName.length === 0 || fileName === '.' || fileName === '..') {
    return false;
  }
  return !/[/\\\0]/.test(fileName);
}

/**
 * Appends the old name's extension to a user-supplied base name unless it
 * already ends with it (case-insensitively).
 */
export function resolveRenamedAssetName(oldName: string, newBase: string): string {
  const extension = getAssetExtension(oldName);
  if (!extension || newBase.toLowerCase().endsWith(extension.toLowerCase())) {
    return newBase;
  }
  return `${newBase}${extension}`;
}

export function parseAssetType(value: unknown): AssetType | null {
  if (value === 'music') {
    return 'music';
  }
  if (value === 'icon' || value === 'icons') {
    return 'icon';
  }
  return null;
}
