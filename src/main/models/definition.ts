/**
 * Raw album definition, as written in `extras/album.yaml`.
 *
 * Definitions store no numbers: disc and track numbers come from their
 * position in the owning list. No entity points back at its owner.
 */

import { TextValue } from './text';

export interface TrackDefinition {
  readonly title: TextValue;
  /** Replaces the album artists when set */
  readonly artists: readonly TextValue[] | null;
  readonly year: number | null;
  readonly genre: TextValue | null;
  readonly comment: TextValue | null;
  readonly lyrics: TextValue | null;
  /** Source file path relative to the album root, when not the canonical one */
  readonly filename: string | null;
}

export interface DiscDefinition {
  readonly tracks: readonly TrackDefinition[];
}

export interface AlbumDefinition {
  readonly title: TextValue;
  readonly artists: readonly TextValue[];
  readonly year: number | null;
  readonly genre: TextValue | null;
  readonly discs: readonly DiscDefinition[];
}

type Text = TextValue | string;

function toText(value: Text): TextValue {
  return typeof value === 'string' ? TextValue.from(value) : value;
}

function toOptionalText(value: Text | null | undefined): TextValue | null {
  return value === undefined || value === null ? null : toText(value);
}

export interface TrackFields {
  artists?: readonly Text[] | null;
  year?: number | null;
  genre?: Text | null;
  comment?: Text | null;
  lyrics?: Text | null;
  filename?: string | null;
}

/**
 * @example defineTrack('Intro', { artists: ['Guest'] })
 */
export function defineTrack(title: Text, fields: TrackFields = {}): TrackDefinition {
  return Object.freeze({
    title: toText(title),
    artists: fields.artists ? Object.freeze(fields.artists.map(toText)) : null,
    year: fields.year ?? null,
    genre: toOptionalText(fields.genre),
    comment: toOptionalText(fields.comment),
    lyrics: toOptionalText(fields.lyrics),
    filename: fields.filename ?? null,
  });
}

/** Bare titles become tracks without overrides */
export function defineDisc(tracks: readonly (TrackDefinition | Text)[]): DiscDefinition {
  return Object.freeze({
    tracks: Object.freeze(
      tracks.map((track) => (typeof track === 'string' || track instanceof TextValue ? defineTrack(track) : track)),
    ),
  });
}

export interface AlbumFields {
  title: Text;
  artists: readonly Text[];
  year?: number | null;
  genre?: Text | null;
  discs: readonly DiscDefinition[];
}

export function defineAlbum(fields: AlbumFields): AlbumDefinition {
  return Object.freeze({
    title: toText(fields.title),
    artists: Object.freeze(fields.artists.map(toText)),
    year: fields.year ?? null,
    genre: toOptionalText(fields.genre),
    discs: Object.freeze([...fields.discs]),
  });
}
