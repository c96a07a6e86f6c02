/**
 * Album view: an album definition placed at its folder on disk.
 *
 * Disc and track views are created on demand from here. They keep a
 * reference to their parent view, which is how attributes and covers fall
 * back from track to disc to album.
 */

import * as path from 'path';
import { COVER_CACHE_DIRS, CoverImage, CoverVariant, DEFAULT_SETTINGS } from '../../shared/types';
import { CoverLookup, CoverTransform, CoverTransformSettings, createCoverTransform, loadCoverWithCache } from '../services/coverResolver';
import { loadAlbumDefinition } from '../services/definitionLoader';
import { ImageCodec, SharpImageCodec } from '../services/imageCodec';
import { LazyCell } from '../utils/lazyCell';
import { AlbumDefinition } from './definition';
import { Disc } from './disc';
import { TextValue, commaSeparated } from './text';
import type { Track } from './track';

/** Name of the album's own cover in the images and cache directories */
export const ALBUM_COVER_NAME = 'Front Cover';

export interface AlbumOptions {
  /** Defaults to `SharpImageCodec` */
  codec?: ImageCodec;
  /** Cover sizes and JPEG quality. Defaults to the default settings */
  coverSettings?: CoverTransformSettings;
}

export class Album {
  private readonly transforms: Record<CoverVariant, CoverTransform>;
  private readonly covers: Record<CoverVariant, LazyCell<CoverImage | null>> = {
    standard: new LazyCell(),
    car: new LazyCell(),
  };

  constructor(
    readonly definition: AlbumDefinition,
    private readonly root: string,
    options: AlbumOptions = {},
  ) {
    const codec = options.codec ?? new SharpImageCodec();
    const settings = options.coverSettings ?? DEFAULT_SETTINGS;
    this.transforms = {
      standard: createCoverTransform('standard', codec, settings),
      car: createCoverTransform('car', codec, settings),
    };
  }

  /**
   * Loads `extras/album.yaml` from an album folder.
   *
   * @throws DefinitionError if the file is missing or malformed
   */
  static async load(root: string, options?: AlbumOptions): Promise<Album> {
    const definition = await loadAlbumDefinition(root);
    return new Album(definition, root, options);
  }

  // ─── Attributes ────────────────────────────────────────────────────────

  title(): TextValue {
    return this.definition.title;
  }

  artists(): readonly TextValue[] {
    return this.definition.artists;
  }

  /** Artists joined with ", " */
  artist(): TextValue {
    return commaSeparated(this.definition.artists);
  }

  year(): number | null {
    return this.definition.year;
  }

  genre(): TextValue | null {
    return this.definition.genre;
  }

  // ─── Structure ─────────────────────────────────────────────────────────

  numDiscs(): number {
    return this.definition.discs.length;
  }

  numTracks(): number {
    return this.definition.discs.reduce((total, disc) => total + disc.tracks.length, 0);
  }

  /**
   * @param discNumber - 1-based
   * @throws RangeError if the album has no such disc
   */
  disc(discNumber: number): Disc {
    const disc = this.definition.discs[discNumber - 1];
    if (!Number.isInteger(discNumber) || disc === undefined) {
      throw new RangeError(`Album has no disc ${discNumber} (it has ${this.numDiscs()})`);
    }
    return new Disc(this, disc, discNumber);
  }

  discs(): Disc[] {
    return this.definition.discs.map((disc, i) => new Disc(this, disc, i + 1));
  }

  /** Every track of every disc, in order. Tracks of a disc share one disc view */
  tracks(): Track[] {
    return this.discs().flatMap((disc) => disc.tracks());
  }

  // ─── Paths ─────────────────────────────────────────────────────────────

  path(): string {
    return this.root;
  }

  extrasPath(): string {
    return path.join(this.root, 'extras');
  }

  imagesPath(): string {
    return path.join(this.extrasPath(), 'images');
  }

  cachePath(): string {
    return path.join(this.extrasPath(), '.cache');
  }

  coversPath(variant: CoverVariant): string {
    return path.join(this.cachePath(), COVER_CACHE_DIRS[variant]);
  }

  // ─── Covers ────────────────────────────────────────────────────────────

  /** Where a node named `name` looks for its cover of the given variant */
  coverLookup(variant: CoverVariant, name: string): CoverLookup {
    return {
      imagesDir: this.imagesPath(),
      cacheDir: this.coversPath(variant),
      name,
      transform: this.transforms[variant],
    };
  }

  /** The album cover of a variant; null when there is none */
  coverFor(variant: CoverVariant): Promise<CoverImage | null> {
    return this.covers[variant].get(() => loadCoverWithCache(this.coverLookup(variant, ALBUM_COVER_NAME)));
  }

  cover(): Promise<CoverImage | null> {
    return this.coverFor('standard');
  }

  carCover(): Promise<CoverImage | null> {
    return this.coverFor('car');
  }
}
