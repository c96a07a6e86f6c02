/**
 * Disc view: a disc definition together with its album and number.
 */

import * as path from 'path';
import { CoverImage, CoverVariant } from '../../shared/types';
import { loadCoverWithCache } from '../services/coverResolver';
import { LazyCell } from '../utils/lazyCell';
import { discFolderName } from '../utils/pathNamer';
import type { Album } from './album';
import { DiscDefinition } from './definition';
import { Track } from './track';

export class Disc {
  /** Own cover of each variant, without the album fallback */
  private readonly ownCovers: Record<CoverVariant, LazyCell<CoverImage | null>> = {
    standard: new LazyCell(),
    car: new LazyCell(),
  };

  constructor(
    readonly album: Album,
    readonly definition: DiscDefinition,
    readonly discNumber: number,
  ) {}

  numTracks(): number {
    return this.definition.tracks.length;
  }

  isOnlyDisc(): boolean {
    return this.album.numDiscs() === 1;
  }

  /**
   * @param trackNumber - 1-based
   * @throws RangeError if the disc has no such track
   */
  track(trackNumber: number): Track {
    const track = this.definition.tracks[trackNumber - 1];
    if (!Number.isInteger(trackNumber) || track === undefined) {
      throw new RangeError(`Disc ${this.discNumber} has no track ${trackNumber} (it has ${this.numTracks()})`);
    }
    return new Track(this, track, trackNumber);
  }

  tracks(): Track[] {
    return this.definition.tracks.map((track, i) => new Track(this, track, i + 1));
  }

  /** "Disc N", or null for the only disc of an album */
  folderName(): string | null {
    return discFolderName(this.discNumber, this.album.numDiscs());
  }

  /** The disc folder; the album folder itself for a single-disc album */
  path(): string {
    const folder = this.folderName();
    return folder === null ? this.album.path() : path.join(this.album.path(), folder);
  }

  /**
   * The disc cover of a variant, falling back to the album's. The only disc
   * of an album has no folder name and so no cover of its own.
   */
  async coverFor(variant: CoverVariant): Promise<CoverImage | null> {
    const own = await this.ownCovers[variant].get(async () => {
      const name = this.folderName();
      return name === null ? null : loadCoverWithCache(this.album.coverLookup(variant, name));
    });
    return own ?? this.album.coverFor(variant);
  }

  cover(): Promise<CoverImage | null> {
    return this.coverFor('standard');
  }

  carCover(): Promise<CoverImage | null> {
    return this.coverFor('car');
  }
}
