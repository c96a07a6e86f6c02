import { describe, it, expect } from 'vitest';
import {
  AlbumError,
  CoverError,
  DefinitionError,
  FileError,
  TagError,
  isAlbumError,
  wrapError,
} from '../../../src/main/services/errors';

describe('errors', () => {
  describe('AlbumError', () => {
    it('should carry its context', () => {
      const cause = new Error('EACCES');
      const error = new TagError('Failed to write ID3 tag', { filePath: '/a.mp3', step: 'writing', cause });

      expect(error).toBeInstanceOf(AlbumError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('TagError');
      expect(error.category).toBe('TagError');
      expect(error.filePath).toBe('/a.mp3');
      expect(error.step).toBe('writing');
      expect(error.cause).toBe(cause);
    });

    it('should default the step per category', () => {
      expect(new DefinitionError('x').step).toBe('loading');
      expect(new TagError('x').step).toBe('tagging');
      expect(new FileError('x').step).toBe('writing');
      expect(new CoverError('x', 'transform').step).toBe('transform');
      expect(new TagError('x').filePath).toBeNull();
      expect(new TagError('x').cause).toBeNull();
    });

    it('should build a log object', () => {
      const error = new CoverError('Failed to read cover', 'source-read', { filePath: '/c.png' });

      expect(error.toLogObject()).toEqual({
        category: 'CoverError',
        message: 'Failed to read cover',
        filePath: '/c.png',
        step: 'source-read',
        timestamp: error.timestamp.toISOString(),
        cause: null,
        reason: 'source-read',
      });
    });
  });

  describe('DefinitionError', () => {
    it('should list its issues', () => {
      const error = new DefinitionError('Album definition is invalid', { issues: ['title: Required', 'year: bad'] });

      expect(error.issues).toEqual(['title: Required', 'year: bad']);
      expect(error.category).toBe('DefinitionError');
    });
  });

  describe('isAlbumError', () => {
    it('should recognise albumsmith errors only', () => {
      expect(isAlbumError(new FileError('x'))).toBe(true);
      expect(isAlbumError(new Error('x'))).toBe(false);
      expect(isAlbumError('x')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should return albumsmith errors unchanged', () => {
      const error = new TagError('x');
      expect(wrapError(error, 'FileError')).toBe(error);
    });

    it('should wrap other values in the given category', () => {
      const cause = new Error('disk full');
      const wrapped = wrapError(cause, 'FileError', { filePath: '/a.mp3', step: 'export' });

      expect(wrapped).toBeInstanceOf(FileError);
      expect(wrapped).toMatchObject({ message: 'disk full', filePath: '/a.mp3', step: 'export', cause });
      expect(wrapError('oops', 'TagError')).toBeInstanceOf(TagError);
      expect(wrapError('oops', 'DefinitionError').message).toBe('oops');
      expect(wrapError(new Error(''), 'TagError').message).toBe('Unknown error');
    });
  });
});
