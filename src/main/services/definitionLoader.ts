/**
 * Definition Loader
 *
 * Reads and writes `extras/album.yaml`. The YAML is parsed with `yaml` and
 * checked with zod before anything is built, so a malformed definition never
 * yields a partial album.
 *
 * Accepted shapes:
 * - any text field: `foo` or `{ text: foo, ascii: bar }`
 * - artists: `artist: foo` or `artists: [foo, bar]`
 * - discs: `tracks: [...]` (one disc) or `discs: [[...], [...]]`
 * - a track: `Title` or `{ title: Title, artist: ..., year: ..., ... }`
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { AlbumDefinition, DiscDefinition, TrackDefinition, defineAlbum, defineDisc, defineTrack } from '../models/definition';
import { TextValue } from '../models/text';
import { DefinitionError } from './errors';

// ─── Schema ──────────────────────────────────────────────────────────────────

const TextSchema = z.union([
  z.string(),
  z.object({
    text: z.string(),
    ascii: z.string().nullish(),
  }),
]);

type RawText = z.infer<typeof TextSchema>;

const YearSchema = z.number().int().positive();

const TrackObjectSchema = z
  .object({
    title: TextSchema,
    artist: TextSchema.nullish(),
    artists: z.array(TextSchema).nullish(),
    year: YearSchema.nullish(),
    genre: TextSchema.nullish(),
    comment: TextSchema.nullish(),
    lyrics: TextSchema.nullish(),
    filename: z.string().min(1).nullish(),
  })
  .refine((track) => track.artist == null || track.artists == null, {
    message: 'use either "artist" or "artists", not both',
    path: ['artists'],
  });

const TrackSchema = z.union([z.string(), TrackObjectSchema]);

const DiscSchema = z.array(TrackSchema);

const AlbumSchema = z
  .object({
    title: TextSchema,
    artist: TextSchema.nullish(),
    artists: z.array(TextSchema).nullish(),
    year: YearSchema.nullish(),
    genre: TextSchema.nullish(),
    tracks: DiscSchema.nullish(),
    discs: z.array(DiscSchema).nullish(),
  })
  .superRefine((album, ctx) => {
    if (album.artist != null && album.artists != null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['artists'], message: 'use either "artist" or "artists", not both' });
    } else if (album.artist == null && album.artists == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['artists'], message: 'missing "artist" or "artists"' });
    }

    if (album.tracks != null && album.discs != null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['discs'], message: 'use either "tracks" or "discs", not both' });
    } else if (album.tracks == null && album.discs == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['discs'], message: 'missing "tracks" or "discs"' });
    }
  });

type RawTrack = z.infer<typeof TrackSchema>;
type RawAlbum = z.infer<typeof AlbumSchema>;

// ─── Conversion ──────────────────────────────────────────────────────────────

function toText(raw: RawText): TextValue {
  return typeof raw === 'string' ? TextValue.from(raw) : TextValue.create(raw.text, raw.ascii);
}

function toOptionalText(raw: RawText | null | undefined): TextValue | null {
  return raw == null ? null : toText(raw);
}

function toArtists(single: RawText | null | undefined, list: RawText[] | null | undefined): TextValue[] | null {
  if (single != null) {
    return [toText(single)];
  }
  return list == null ? null : list.map(toText);
}

function toTrack(raw: RawTrack): TrackDefinition {
  if (typeof raw === 'string') {
    return defineTrack(raw);
  }
  return defineTrack(toText(raw.title), {
    artists: toArtists(raw.artist, raw.artists),
    year: raw.year,
    genre: toOptionalText(raw.genre),
    comment: toOptionalText(raw.comment),
    lyrics: toOptionalText(raw.lyrics),
    filename: raw.filename,
  });
}

function toAlbum(raw: RawAlbum): AlbumDefinition {
  const discs = raw.tracks != null ? [raw.tracks] : (raw.discs ?? []);
  return defineAlbum({
    title: toText(raw.title),
    artists: toArtists(raw.artist, raw.artists) ?? [],
    year: raw.year,
    genre: toOptionalText(raw.genre),
    discs: discs.map((tracks) => defineDisc(tracks.map(toTrack))),
  });
}

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length === 0 ? '(root)' : issue.path.join('.');
  return `${location}: ${issue.message}`;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/** Location of the definition inside an album folder */
export function definitionPath(root: string): string {
  return path.join(root, 'extras', 'album.yaml');
}

/**
 * Parses a YAML album definition.
 *
 * @param filePath - Only used in error messages
 * @throws DefinitionError listing every problem found
 */
export function parseAlbumDefinition(source: string, filePath?: string): AlbumDefinition {
  let document: unknown;
  try {
    document = parse(source);
  } catch (error: unknown) {
    throw new DefinitionError('Album definition is not valid YAML', {
      filePath,
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }

  const result = AlbumSchema.safeParse(document);
  if (!result.success) {
    throw new DefinitionError('Album definition is invalid', {
      filePath,
      step: 'validating',
      issues: result.error.issues.map(formatIssue),
    });
  }
  return toAlbum(result.data);
}

/**
 * Reads `extras/album.yaml` from an album folder.
 *
 * @throws DefinitionError if the file cannot be read or is malformed
 */
export async function loadAlbumDefinition(root: string): Promise<AlbumDefinition> {
  const filePath = definitionPath(root);
  let source: string;
  try {
    source = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new DefinitionError('Failed to read album definition', {
      filePath,
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }
  return parseAlbumDefinition(source, filePath);
}

// ─── Serialization ───────────────────────────────────────────────────────────

type TextNode = string | { text: string; ascii: string };

function textNode(text: TextValue): TextNode {
  return text.hasOverriddenAscii() ? { text: text.value(), ascii: text.ascii() } : text.value();
}

function setArtists(node: Record<string, unknown>, artists: readonly TextValue[]): void {
  if (artists.length === 1) {
    node.artist = textNode(artists[0]);
  } else {
    node.artists = artists.map(textNode);
  }
}

function trackNode(track: TrackDefinition): TextNode | Record<string, unknown> {
  const node: Record<string, unknown> = { title: textNode(track.title) };
  if (track.artists !== null) setArtists(node, track.artists);
  if (track.year !== null) node.year = track.year;
  if (track.genre !== null) node.genre = textNode(track.genre);
  if (track.comment !== null) node.comment = textNode(track.comment);
  if (track.lyrics !== null) node.lyrics = textNode(track.lyrics);
  if (track.filename !== null) node.filename = track.filename;

  // a track with nothing but a plain title is written as the bare title
  return Object.keys(node).length === 1 && typeof node.title === 'string' ? node.title : node;
}

function discNode(disc: DiscDefinition): Array<TextNode | Record<string, unknown>> {
  return disc.tracks.map(trackNode);
}

/**
 * Writes a definition as YAML, using the singular `artist` and `tracks`
 * keys for one-element lists.
 */
export function serializeAlbumDefinition(definition: AlbumDefinition): string {
  const node: Record<string, unknown> = { title: textNode(definition.title) };
  setArtists(node, definition.artists);
  if (definition.year !== null) node.year = definition.year;
  if (definition.genre !== null) node.genre = textNode(definition.genre);
  if (definition.discs.length === 1) {
    node.tracks = discNode(definition.discs[0]);
  } else {
    node.discs = definition.discs.map(discNode);
  }
  return stringify(node);
}

/** Writes `extras/album.yaml`, creating `extras/` if needed */
export async function saveAlbumDefinition(root: string, definition: AlbumDefinition): Promise<string> {
  const filePath = definitionPath(root);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, serializeAlbumDefinition(definition), 'utf-8');
  return filePath;
}
