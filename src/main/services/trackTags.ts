/**
 * Resolves the tag data of a track view for the tag writer.
 */

import { TrackTags } from '../../shared/types';
import { Track } from '../models/track';

/**
 * Tags for the library copy: native text, every field, standard cover.
 * The artist is left out when there are no artists and the disc number on
 * a single-disc album.
 */
export async function buildTrackTags(track: Track): Promise<TrackTags> {
  const albumArtist = track.albumArtist();
  return {
    title: track.title().value(),
    artist: track.artists().length === 0 ? null : track.artist().value(),
    albumArtist: albumArtist === null ? null : albumArtist.value(),
    album: track.album.title().value(),
    trackNumber: track.trackNumber,
    discNumber: track.disc.isOnlyDisc() ? null : track.disc.discNumber,
    year: track.year(),
    genre: track.genre()?.value() ?? null,
    comment: track.comment()?.value() ?? null,
    lyrics: track.lyrics()?.value() ?? null,
    cover: await track.cover(),
  };
}

/**
 * Tags for the car export: ASCII text, numbers and the small cover only.
 */
export async function buildCarTrackTags(track: Track): Promise<TrackTags> {
  const albumArtist = track.albumArtist();
  return {
    title: track.title().ascii(),
    artist: track.artists().length === 0 ? null : track.artist().ascii(),
    albumArtist: albumArtist === null ? null : albumArtist.ascii(),
    album: track.album.title().ascii(),
    trackNumber: track.trackNumber,
    discNumber: track.disc.isOnlyDisc() ? null : track.disc.discNumber,
    year: null,
    genre: null,
    comment: null,
    lyrics: null,
    cover: await track.carCover(),
  };
}
