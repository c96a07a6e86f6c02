/**
 * Track view: a track definition together with its disc, album and number.
 *
 * Artists, year and genre fall back to the album when the track has none;
 * comment and lyrics belong to the track alone.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CoverImage, CoverVariant } from '../../shared/types';
import { loadCoverWithCache } from '../services/coverResolver';
import { LazyCell } from '../utils/lazyCell';
import { TrackPosition, canonicalTrackFilename, carTrackFilename } from '../utils/pathNamer';
import type { Album } from './album';
import { TrackDefinition } from './definition';
import type { Disc } from './disc';
import { TextValue, commaSeparated, textListsEqual } from './text';

export class Track {
  /** Own cover of each variant, without the disc fallback */
  private readonly ownCovers: Record<CoverVariant, LazyCell<CoverImage | null>> = {
    standard: new LazyCell(),
    car: new LazyCell(),
  };

  constructor(
    readonly disc: Disc,
    readonly definition: TrackDefinition,
    readonly trackNumber: number,
  ) {}

  get album(): Album {
    return this.disc.album;
  }

  // ─── Attributes ────────────────────────────────────────────────────────

  title(): TextValue {
    return this.definition.title;
  }

  artists(): readonly TextValue[] {
    return this.definition.artists ?? this.album.artists();
  }

  artist(): TextValue {
    return commaSeparated(this.artists());
  }

  /**
   * The album artists, only when they differ from this track's artists,
   * in which case the tag needs an explicit album artist.
   */
  albumArtists(): readonly TextValue[] | null {
    const albumArtists = this.album.artists();
    return textListsEqual(this.artists(), albumArtists) ? null : albumArtists;
  }

  albumArtist(): TextValue | null {
    const albumArtists = this.albumArtists();
    return albumArtists === null ? null : commaSeparated(albumArtists);
  }

  year(): number | null {
    return this.definition.year ?? this.album.year();
  }

  genre(): TextValue | null {
    return this.definition.genre ?? this.album.genre();
  }

  comment(): TextValue | null {
    return this.definition.comment;
  }

  lyrics(): TextValue | null {
    return this.definition.lyrics;
  }

  // ─── Names and Paths ───────────────────────────────────────────────────

  position(): TrackPosition {
    return {
      discNumber: this.disc.discNumber,
      numDiscs: this.album.numDiscs(),
      trackNumber: this.trackNumber,
      numTracks: this.disc.numTracks(),
    };
  }

  canonicalFilename(): string {
    return canonicalTrackFilename(this.title(), this.position());
  }

  /** The explicit filename (relative to the album folder) or the canonical one */
  filename(): string {
    return this.definition.filename ?? this.canonicalFilename();
  }

  /** Filename in the flat car export */
  carFilename(): string {
    return carTrackFilename(this.title(), this.position());
  }

  canonicalPath(): string {
    return path.join(this.disc.path(), this.canonicalFilename());
  }

  /** Where the source file is: an explicit filename resolves against the album folder */
  path(): string {
    const explicit = this.definition.filename;
    return explicit === null ? this.canonicalPath() : path.join(this.album.path(), explicit);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.promises.access(this.path());
      return true;
    } catch {
      return false;
    }
  }

  // ─── Covers ────────────────────────────────────────────────────────────

  /** The track cover of a variant, falling back to the disc's */
  async coverFor(variant: CoverVariant): Promise<CoverImage | null> {
    const own = await this.ownCovers[variant].get(() =>
      loadCoverWithCache(this.album.coverLookup(variant, this.title().fileSafe())),
    );
    return own ?? this.disc.coverFor(variant);
  }

  cover(): Promise<CoverImage | null> {
    return this.coverFor('standard');
  }

  carCover(): Promise<CoverImage | null> {
    return this.coverFor('car');
  }
}
