/**
 * File Scanner Utility
 *
 * Recursively scans directories for MP3 files and turns arbitrary text into
 * filename-safe text.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AUDIO_EXTENSION } from '../../shared/types';

/** Characters that are rejected by at least one common filesystem */
export const FILE_UNSAFE_CHARS: readonly string[] = ['<', '>', ':', '"', '/', '|', '~', '\\', '*', '?'];

/**
 * Checks if a file has the audio extension albumsmith handles.
 * @param filePath - Path to the file
 */
export function isAudioFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === AUDIO_EXTENSION;
}

/**
 * Recursively scans a directory for MP3 files.
 * @param dirPath - Path to the directory to scan
 * @returns Array of absolute paths to MP3 files found, sorted
 */
export function scanDirectoryForAudioFiles(dirPath: string): string[] {
  const audioFiles: string[] = [];

  function scanRecursive(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch {
      // Unreadable directories (permissions, etc.) hold nothing we can tag
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        scanRecursive(fullPath);
      } else if (entry.isFile() && isAudioFile(entry.name)) {
        audioFiles.push(fullPath);
      }
    }
  }

  scanRecursive(dirPath);
  return audioFiles.sort();
}

/**
 * Checks whether a string can be used in a filename as is.
 */
export function isFileSafe(value: string): boolean {
  return !FILE_UNSAFE_CHARS.some((c) => value.includes(c));
}

/**
 * Returns a filename-safe version of a string, or null if it already is one.
 *
 * Substitutions: `<` → `[`, `>` → `]`, `:` → ` -` before a space and `-`
 * otherwise, `"` → `'`, `/ | ~` → `-`, `\ *` → `_`, `?` is dropped.
 *
 * @example makeFileSafe('foo: bar') === 'foo - bar'
 * @example makeFileSafe('foo-bar') === null
 */
export function makeFileSafe(value: string): string | null {
  if (isFileSafe(value)) {
    return null;
  }

  let result = '';
  for (let i = 0; i < value.length; i++) {
    const c = value[i];
    switch (c) {
      case '<':
        result += '[';
        break;
      case '>':
        result += ']';
        break;
      case ':':
        result += value[i + 1] === ' ' ? ' -' : '-';
        break;
      case '"':
        result += "'";
        break;
      case '/':
      case '|':
      case '~':
        result += '-';
        break;
      case '\\':
      case '*':
        result += '_';
        break;
      case '?':
        break;
      default:
        result += c;
    }
  }
  return result;
}

/**
 * Splits a leading article ("a", "an" or "the", any case) followed by a
 * single space from a string.
 *
 * @returns The article and the rest, or null without a leading article
 * @example splitArticle('A Thing') → ['A', 'Thing']
 */
export function splitArticle(value: string): [article: string, rest: string] | null {
  const match = /^(the|an|a) ([\s\S]*)$/i.exec(value);
  if (!match) {
    return null;
  }
  return [match[1], match[2]];
}
