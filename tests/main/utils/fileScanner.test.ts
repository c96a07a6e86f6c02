import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  FILE_UNSAFE_CHARS,
  isAudioFile,
  isFileSafe,
  makeFileSafe,
  scanDirectoryForAudioFiles,
  splitArticle,
} from '../../../src/main/utils/fileScanner';

describe('fileScanner', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'albumsmith-scan-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('isAudioFile', () => {
    it('should accept mp3 files in any case', () => {
      expect(isAudioFile('song.mp3')).toBe(true);
      expect(isAudioFile('SONG.MP3')).toBe(true);
      expect(isAudioFile('/music/artist/song.mp3')).toBe(true);
    });

    it('should reject other files', () => {
      expect(isAudioFile('song.flac')).toBe(false);
      expect(isAudioFile('cover.png')).toBe(false);
      expect(isAudioFile('mp3')).toBe(false);
    });
  });

  describe('scanDirectoryForAudioFiles', () => {
    it('should find mp3 files recursively and sort them', () => {
      fs.mkdirSync(path.join(tempDir, 'Disc 2'));
      fs.mkdirSync(path.join(tempDir, 'Disc 1'));
      fs.writeFileSync(path.join(tempDir, 'Disc 2', 'a.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'Disc 1', 'b.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'notes.txt'), '');

      expect(scanDirectoryForAudioFiles(tempDir)).toEqual([
        path.join(tempDir, 'Disc 1', 'b.mp3'),
        path.join(tempDir, 'Disc 2', 'a.mp3'),
      ]);
    });

    it('should return nothing for a missing directory', () => {
      expect(scanDirectoryForAudioFiles(path.join(tempDir, 'missing'))).toEqual([]);
    });

    it('should skip directories named like audio files', () => {
      fs.mkdirSync(path.join(tempDir, 'folder.mp3'));
      expect(scanDirectoryForAudioFiles(tempDir)).toEqual([]);
    });
  });

  describe('makeFileSafe', () => {
    it('should return null for safe strings', () => {
      expect(makeFileSafe('foo-bar')).toBeNull();
      expect(makeFileSafe('')).toBeNull();
      expect(isFileSafe('foo-bar')).toBe(true);
    });

    it('should substitute every unsafe character', () => {
      expect(makeFileSafe('<a>')).toBe('[a]');
      expect(makeFileSafe('foo: bar')).toBe('foo - bar');
      expect(makeFileSafe('foo:bar')).toBe('foo-bar');
      expect(makeFileSafe('"q"')).toBe("'q'");
      expect(makeFileSafe('a/b|c~d')).toBe('a-b-c-d');
      expect(makeFileSafe('a\\b*c')).toBe('a_b_c');
      expect(makeFileSafe('why?')).toBe('why');
    });

    it('should produce safe output', () => {
      const result = makeFileSafe(FILE_UNSAFE_CHARS.join(' '));
      expect(result).not.toBeNull();
      expect(isFileSafe(result ?? '')).toBe(true);
    });
  });

  describe('splitArticle', () => {
    it('should split a leading article', () => {
      expect(splitArticle('The Wall')).toEqual(['The', 'Wall']);
      expect(splitArticle('a thing')).toEqual(['a', 'thing']);
      expect(splitArticle('AN Apple')).toEqual(['AN', 'Apple']);
    });

    it('should keep everything after the first space', () => {
      expect(splitArticle('The  Double')).toEqual(['The', ' Double']);
    });

    it('should return null without an article', () => {
      expect(splitArticle('Theory')).toBeNull();
      expect(splitArticle('The')).toBeNull();
      expect(splitArticle('Hello The World')).toBeNull();
    });
  });
});
