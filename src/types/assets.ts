export type AssetType = 'music' | 'icon';

export type MusicExtension = '.mp3' | '.wav';
export type IconExtension = '.png' | '.jpg' | '.jpeg' | '.webp';

export interface AssetCatalog {
  music: string[];
  icons: string[];
}
