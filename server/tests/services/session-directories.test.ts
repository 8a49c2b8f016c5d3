import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, mkdir, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SessionDirectories } from '../../src/services/session-directories.js';

describe('SessionDirectories', () => {
  let root: string;
  let directories: SessionDirectories;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'session-dirs-'));
    directories = new SessionDirectories(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('pathsFor', () => {
    it('should key the session root by port', () => {
      expect(directories.pathsFor(41000)).toEqual({
        root: join(root, 'session-41000'),
        sockets: join(root, 'session-41000', 'sockets'),
        runtime: join(root, 'session-41000', 'runtime'),
        profile: join(root, 'session-41000', 'profile'),
        temp: join(root, 'session-41000', 'temp'),
      });
    });
  });

  describe('prepare', () => {
    it('should create the four subareas', async () => {
      const paths = await directories.prepare(41000);

      for (const dir of [paths.sockets, paths.runtime, paths.profile, paths.temp]) {
        expect((await stat(dir)).isDirectory()).toBe(true);
      }
    });

    it('should restrict runtime to the owner', async () => {
      const paths = await directories.prepare(41000);

      expect((await stat(paths.runtime)).mode & 0o777).toBe(0o700);
      expect((await stat(paths.temp)).mode & 0o777).toBe(0o755);
      expect((await stat(paths.profile)).mode & 0o777).toBe(0o755);
    });

    it('should be idempotent', async () => {
      await directories.prepare(41000);
      const paths = await directories.prepare(41000);

      expect(existsSync(paths.runtime)).toBe(true);
    });
  });

  describe('destroy', () => {
    it('should remove the whole tree', async () => {
      const paths = await directories.prepare(41000);
      await writeFile(join(paths.profile, 'prefs.js'), 'user_pref("a", 1);');

      await directories.destroy(paths.root);

      expect(existsSync(paths.root)).toBe(false);
    });

    it('should treat a missing directory as success', async () => {
      await expect(directories.destroy(join(root, 'session-41001'))).resolves.toBeUndefined();
      await expect(directories.destroy(join(root, 'session-41001'))).resolves.toBeUndefined();
    });

    it('should refuse paths outside the sessions root', async () => {
      await expect(directories.destroy(join(tmpdir(), 'session-41000'))).rejects.toThrow('Refusing to remove');
      await expect(directories.destroy(join(root, 'other'))).rejects.toThrow('Refusing to remove');
    });
  });

  describe('listSessionDirectories', () => {
    it('should list session directories sorted by port', async () => {
      await directories.prepare(41002);
      await directories.prepare(41001);
      await mkdir(join(root, 'unrelated'));

      expect(await directories.listSessionDirectories()).toEqual([
        { port: 41001, root: join(root, 'session-41001') },
        { port: 41002, root: join(root, 'session-41002') },
      ]);
    });

    it('should return nothing when the root does not exist', async () => {
      const missing = new SessionDirectories(join(root, 'missing'));
      expect(await missing.listSessionDirectories()).toEqual([]);
    });
  });
});
