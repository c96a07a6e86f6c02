import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parse } from 'yaml';
import { CliEnvironment, USAGE, formatReport, main } from '../../src/main/index';
import { DEFAULT_SETTINGS } from '../../src/shared/types';

const ALBUM_YAML = [
  'title: Album',
  'artist: Band',
  'year: 2001',
  'discs:',
  '  - - One',
  '    - title: Two',
  '      artist: Guest',
  '  - - Three',
  '',
].join('\n');

describe('albumsmith CLI', () => {
  let tempDir: string;
  let albumDir: string;
  let stdout: string[];
  let stderr: string[];
  let env: CliEnvironment;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'albumsmith-cli-'));
    albumDir = path.join(tempDir, 'album');
    fs.mkdirSync(albumDir);
    stdout = [];
    stderr = [];
    env = {
      cwd: tempDir,
      settingsDir: path.join(tempDir, 'settings'),
      logDir: path.join(tempDir, 'logs'),
      writeLogFile: false,
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeDefinition(content: string = ALBUM_YAML): void {
    fs.mkdirSync(path.join(albumDir, 'extras'), { recursive: true });
    fs.writeFileSync(path.join(albumDir, 'extras', 'album.yaml'), content);
  }

  function writeTrackFiles(): void {
    for (const file of ['Disc 1/1 - One.mp3', 'Disc 1/2 - Two.mp3', 'Disc 2/1 - Three.mp3']) {
      fs.mkdirSync(path.dirname(path.join(albumDir, file)), { recursive: true });
      fs.writeFileSync(path.join(albumDir, file), Buffer.alloc(64, 0x22));
    }
  }

  // ─── Command Line ────────────────────────────────────────────────────

  describe('command line', () => {
    it('should print the usage for --help', async () => {
      await expect(main(['--help'], env)).resolves.toBe(0);
      expect(stdout).toEqual([USAGE]);
    });

    it('should require a command', async () => {
      await expect(main([], env)).resolves.toBe(2);
      expect(stderr).toEqual([USAGE]);
    });

    it('should reject unknown options', async () => {
      await expect(main(['show', '--loud'], env)).resolves.toBe(2);
      expect(stderr[stderr.length - 1]).toBe(USAGE);
    });

    it('should reject unknown commands', async () => {
      writeDefinition();
      await expect(main(['dance', '-f', 'album'], env)).resolves.toBe(2);
      expect(stderr[0]).toBe('Unknown command "dance"');
    });
  });

  // ─── config ──────────────────────────────────────────────────────────

  describe('config', () => {
    it('should print the current settings', async () => {
      await expect(main(['config'], env)).resolves.toBe(0);
      expect(JSON.parse(stdout[0])).toEqual(DEFAULT_SETTINGS);
    });

    it('should change and persist a setting', async () => {
      await expect(main(['config', 'coverSize', '600'], env)).resolves.toBe(0);
      stdout = [];
      await main(['config'], env);

      expect(JSON.parse(stdout[0])).toEqual({ ...DEFAULT_SETTINGS, coverSize: 600 });
    });

    it('should reset the settings', async () => {
      await main(['config', 'jpegQuality', '20'], env);
      stdout = [];

      await expect(main(['config', '--reset'], env)).resolves.toBe(0);
      expect(JSON.parse(stdout[0])).toEqual(DEFAULT_SETTINGS);
    });

    it('should reject unknown keys and missing values', async () => {
      await expect(main(['config', 'colour', 'red'], env)).resolves.toBe(2);
      await expect(main(['config', 'coverSize'], env)).resolves.toBe(2);
      expect(stderr).toEqual(['Unknown setting "colour"', 'Missing value for "coverSize"']);
    });
  });

  // ─── Album Commands ──────────────────────────────────────────────────

  describe('show', () => {
    it('should print the definition as YAML', async () => {
      writeDefinition();

      await expect(main(['show', '--folder', 'album'], env)).resolves.toBe(0);
      expect(stdout).toHaveLength(1);
      expect(parse(stdout[0])).toEqual({
        title: 'Album',
        artist: 'Band',
        year: 2001,
        discs: [['One', { title: 'Two', artist: 'Guest' }], ['Three']],
      });
    });

    it('should fail without a definition', async () => {
      await expect(main(['show', '-f', 'album'], env)).resolves.toBe(1);
      expect(stderr[0]).toMatch(/^ERROR Failed to read album definition: .*ENOENT/);
    });

    it('should list the problems of an invalid definition', async () => {
      writeDefinition('title: Album\nartist: Band\n');

      await expect(main(['show', '-f', 'album'], env)).resolves.toBe(1);
      expect(stderr[stderr.length - 1]).toBe('  - discs: missing "tracks" or "discs"');
    });
  });

  describe('list', () => {
    it('should list the tracks by disc', async () => {
      writeDefinition();

      await expect(main(['list', '--folder', 'album'], env)).resolves.toBe(0);
      expect(stdout).toEqual([
        'Album (Band, 2001)',
        '  Disc 1/',
        '    1 - One.mp3',
        '    2 - Two.mp3  [Guest]',
        '  Disc 2/',
        '    1 - Three.mp3',
      ]);
    });
  });

  describe('tag commands', () => {
    it('should update and then validate every track', async () => {
      writeDefinition();
      writeTrackFiles();

      await expect(main(['update', '-f', 'album'], env)).resolves.toBe(0);
      expect(stdout[stdout.length - 1]).toBe('update: 3 done, 0 skipped, 0 failed (3 tracks)');
      expect(stdout[0]).toBe(`INFO  tags updated [${path.join(albumDir, 'Disc 1', '1 - One.mp3')}]`);

      stdout = [];
      await expect(main(['validate', '-f', 'album'], env)).resolves.toBe(0);
      expect(stdout[stdout.length - 1]).toBe('validate: 3 done, 0 skipped, 0 failed (3 tracks)');
    });

    it('should exit with 1 when a track fails', async () => {
      writeDefinition();
      writeTrackFiles();

      await expect(main(['validate', '-f', 'album'], env)).resolves.toBe(1);
      expect(stdout[stdout.length - 1]).toBe('validate: 0 done, 0 skipped, 3 failed (3 tracks)');
      expect(stderr).toHaveLength(3);
    });
  });

  describe('export', () => {
    it('should need an output folder', async () => {
      writeDefinition();

      await expect(main(['export', '-f', 'album'], env)).resolves.toBe(2);
      expect(stderr[0]).toBe(
        'No export folder: pass one, use --root, or set exportRoot with "albumsmith config exportRoot <dir>"',
      );
    });

    it('should reject an unknown format', async () => {
      writeDefinition();

      await expect(main(['export', 'out', '-f', 'album', '--format', 'tape'], env)).resolves.toBe(2);
      expect(stderr[0]).toBe('Unknown export format "tape" (expected full, car or vw)');
    });

    it('should export below the configured root', async () => {
      writeDefinition();
      writeTrackFiles();
      await main(['config', 'exportRoot', path.join(tempDir, 'library')], env);

      await expect(main(['export', '-f', 'album'], env)).resolves.toBe(0);
      expect(fs.existsSync(path.join(tempDir, 'library', 'Band', 'Album', 'Disc 2', '2-1 - Three.mp3'))).toBe(true);
    });

    it('should export the car layout to the given folder', async () => {
      writeDefinition();
      writeTrackFiles();

      await expect(main(['export', 'car', '-f', 'album', '--format', 'car'], env)).resolves.toBe(0);
      expect(fs.readdirSync(path.join(tempDir, 'car')).sort()).toEqual([
        '1-1 - One.mp3',
        '1-2 - Two.mp3',
        '2-1 - Three.mp3',
      ]);
    });

    it('should take vw as the car layout', async () => {
      writeDefinition();
      writeTrackFiles();

      await expect(main(['export', 'vw', '-f', 'album', '--format', 'vw'], env)).resolves.toBe(0);
      expect(fs.readdirSync(path.join(tempDir, 'vw')).sort()).toEqual([
        '1-1 - One.mp3',
        '1-2 - Two.mp3',
        '2-1 - Three.mp3',
      ]);
    });
  });

  describe('rename', () => {
    it('should report moves in a dry run', async () => {
      writeDefinition('title: A\nartist: B\ntracks:\n  - title: Song\n    filename: old.mp3\n');
      fs.writeFileSync(path.join(albumDir, 'old.mp3'), '');

      await expect(main(['rename', '-f', 'album', '--dry-run'], env)).resolves.toBe(0);
      expect(stdout).toEqual([
        `INFO  would rename to ${path.join(albumDir, 'Song.mp3')} [${path.join(albumDir, 'old.mp3')}]`,
        'rename: 1 done, 0 skipped, 0 failed (1 tracks)',
      ]);
      expect(fs.existsSync(path.join(albumDir, 'old.mp3'))).toBe(true);
    });
  });

  describe('generate', () => {
    it('should refuse to overwrite a definition', async () => {
      writeDefinition();

      await expect(main(['generate', '-f', 'album'], env)).resolves.toBe(1);
      expect(fs.readFileSync(path.join(albumDir, 'extras', 'album.yaml'), 'utf-8')).toBe(ALBUM_YAML);
    });

    it('should draft a definition for a folder', async () => {
      await expect(main(['generate', '-f', 'album'], env)).resolves.toBe(0);

      const filePath = path.join(albumDir, 'extras', 'album.yaml');
      expect(stdout).toEqual([`Wrote ${filePath}`]);
      expect(fs.readFileSync(filePath, 'utf-8')).toBe('title: album\nartists: []\ndiscs: []\n');
    });
  });

  describe('formatReport', () => {
    it('should summarize a batch', () => {
      expect(formatReport({ action: 'update', total: 4, succeeded: 3, skipped: 1, failures: [] })).toBe(
        'update: 3 done, 1 skipped, 0 failed (4 tracks)',
      );
    });
  });
});
