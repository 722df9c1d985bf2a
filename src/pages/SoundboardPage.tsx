import { renderToStaticMarkup } from 'react-dom/server';

import { ICON_EXTENSIONS, MUSIC_EXTENSIONS } from '../assets/assetNames';
import type { PlaybackSnapshot } from '../types/playback';
import type { Slot } from '../types/slots';

export interface SoundboardPageProps {
  title: string;
  slots: Slot[];
  music: string[];
  icons: string[];
  playback: PlaybackSnapshot;
}

function iconUrl(icon: string): string {
  return `/static/icons/${encodeURIComponent(icon)}`;
}

function SlotCard({ slot, playing }: { slot: Slot; playing: boolean }) {
  return (
    <li className={playing ? 'slot playing' : 'slot'} data-slot-id={slot.id}>
      {slot.icon ? <img className="slot-icon" src={iconUrl(slot.icon)} alt="" /> : null}
      <strong className="slot-label">{slot.label}</strong>
      <span className="slot-track">{slot.filename ?? 'Unassigned'}</span>
      <div className="slot-actions">
        <button
          type="button"
          data-action="play"
          data-filename={slot.filename ?? undefined}
          disabled={!slot.filename}
          aria-label={`Play ${slot.label}`}
        >
          Play
        </button>
        <button type="button" data-action="unmap" data-slot-id={slot.id} aria-label={`Unmap ${slot.label}`}>
          Unmap
        </button>
      </div>
    </li>
  );
}

function AssetList({ kind, title, names }: { kind: 'music' | 'icon'; title: string; names: string[] }) {
  const accept = (kind === 'music' ? MUSIC_EXTENSIONS : ICON_EXTENSIONS).join(',');

  return (
    <section className="panel asset-list" aria-label={title}>
      <h2>{title}</h2>
      {names.length === 0 ? <p className="subtle">No files yet.</p> : null}
      <ul>
        {names.map((name) => (
          <li key={name} data-asset-type={kind} data-asset-name={name}>
            <span>{name}</span>
            <button type="button" data-action="rename" aria-label={`Rename ${name}`}>
              Rename
            </button>
            <button type="button" data-action="delete" aria-label={`Delete ${name}`}>
              Delete
            </button>
          </li>
        ))}
      </ul>
      <form data-action="upload" data-asset-type={kind}>
        <input type="file" name="file" accept={accept} aria-label={`Upload ${kind}`} />
        <button type="submit">Upload</button>
      </form>
    </section>
  );
}

export function SoundboardPage({ title, slots, music, icons, playback }: SoundboardPageProps) {
  const nowPlaying = playback.status === 'playing' ? playback.track : null;

  return (
    <main className="soundboard">
      <header className="panel-header-inline">
        <h1>{title}</h1>
        <span className="status-pill" role="status">
          {nowPlaying ? `Playing ${nowPlaying}` : 'Stopped'}
        </span>
        <button type="button" data-action="stop">
          Stop
        </button>
        <label>
          Volume
          <input
            type="range"
            data-action="volume"
            min={0}
            max={1}
            step={0.05}
            defaultValue={playback.volume}
          />
        </label>
      </header>

      <ol className="slot-grid" aria-label="Slots">
        {slots.map((slot) => (
          <SlotCard key={slot.id} slot={slot} playing={nowPlaying !== null && slot.filename === nowPlaying} />
        ))}
      </ol>

      <section className="panel" aria-label="Map slot">
        <h2>Map a slot</h2>
        <form data-action="map">
          <select name="slot_id" aria-label="Slot" defaultValue={slots[0]?.id}>
            {slots.map((slot) => (
              <option key={slot.id} value={slot.id}>
                {slot.id}: {slot.label}
              </option>
            ))}
          </select>
          <input type="text" name="label" placeholder="Label" aria-label="Label" />
          <select name="filename" aria-label="Track" defaultValue="">
            <option value="">(keep track)</option>
            {music.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
          <select name="icon" aria-label="Icon" defaultValue="">
            <option value="">(keep icon)</option>
            {icons.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
          <button type="submit">Save</button>
        </form>
      </section>

      <AssetList kind="music" title="Music" names={music} />
      <AssetList kind="icon" title="Icons" names={icons} />
    </main>
  );
}

export function renderSoundboardDocument(props: SoundboardPageProps): string {
  const markup = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{props.title}</title>
        <link rel="stylesheet" href="/static/soundboard.css" />
      </head>
      <body>
        <SoundboardPage {...props} />
        <script src="/static/soundboard.js" defer />
      </body>
    </html>,
  );
  return `<!DOCTYPE html>${markup}`;
}
