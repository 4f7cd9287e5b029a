import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileSystemTreeStore } from '../../src/storage/filesystem.store';
import { StorePath, WriteOptions } from '../../src/storage/store.types';
import { PROJECT_INFO_FILE, ProjectService } from '../../src/services/project.service';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../../src/middleware/error.middleware';
import { makeTempDir, manualClock, removeTempDir, snapshotTree } from '../helpers/fixtures';

const USER = 'alice_dev1';

class FailingInfoStore extends FileSystemTreeStore {
  async writeFile(target: StorePath, data: Buffer | string, options?: WriteOptions): Promise<void> {
    if (target[target.length - 1] === PROJECT_INFO_FILE) {
      throw new StorageError('disk full');
    }
    return super.writeFile(target, data, options);
  }
}

describe('ProjectService', () => {
  let root: string;
  let store: FileSystemTreeStore;
  let clock: ReturnType<typeof manualClock>;
  let projects: ProjectService;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new FileSystemTreeStore(root);
    clock = manualClock();
    projects = new ProjectService(store, clock.now);
    await store.makeDirectory([USER, 'projects']);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('createProject', () => {
    it('creates main/, temp/ and the info record', async () => {
      const info = await projects.createProject(USER, 'thesis');

      expect(info).toEqual({ name: 'thesis', created_at: '2024-05-01T12:00:00.000Z' });
      expect(await store.kind([USER, 'projects', 'thesis', 'main'])).toBe('directory');
      expect(await store.kind([USER, 'projects', 'thesis', 'temp'])).toBe('directory');
      const record = JSON.parse((await store.readFile([USER, 'projects', 'thesis', PROJECT_INFO_FILE])).toString());
      expect(record).toEqual({ created_at: '2024-05-01T12:00:00.000Z' });
    });

    it('refuses a second project with the same name and leaves the first untouched', async () => {
      await projects.createProject(USER, 'thesis');
      await projects.upload(USER, 'thesis', 'temp', 'draft.txt', Buffer.from('draft'));
      const before = await snapshotTree(root);

      clock.advance(5000);
      await expect(projects.createProject(USER, 'thesis')).rejects.toThrow(
        new ConflictError("Project 'thesis' already exists")
      );

      expect(await snapshotTree(root)).toEqual(before);
    });

    it.each(['bad name', '..', 'a/b', '', 'x'.repeat(101)])('rejects the name %j', async (name) => {
      await expect(projects.createProject(USER, name)).rejects.toBeInstanceOf(ValidationError);
    });

    it('works for a user whose projects directory is missing', async () => {
      await expect(projects.createProject('fresh_user', 'first')).resolves.toMatchObject({ name: 'first' });
    });

    it('removes the project directory when setup fails part way', async () => {
      const failing = new ProjectService(new FailingInfoStore(root), clock.now);

      await expect(failing.createProject(USER, 'thesis')).rejects.toBeInstanceOf(StorageError);
      expect(await store.kind([USER, 'projects', 'thesis'])).toBeNull();
    });
  });

  describe('listProjects', () => {
    it('is empty for a user without projects or without a namespace', async () => {
      expect(await projects.listProjects(USER)).toEqual([]);
      expect(await projects.listProjects('nobody_here')).toEqual([]);
    });

    it('sorts newest first, ties by name, unreadable info last', async () => {
      await projects.createProject(USER, 'alpha');
      clock.advance(1000);
      await projects.createProject(USER, 'gamma');
      await projects.createProject(USER, 'beta');
      await store.makeDirectory([USER, 'projects', 'orphan']);

      expect(await projects.listProjects(USER)).toEqual([
        { name: 'beta', created_at: '2024-05-01T12:00:01.000Z' },
        { name: 'gamma', created_at: '2024-05-01T12:00:01.000Z' },
        { name: 'alpha', created_at: '2024-05-01T12:00:00.000Z' },
        { name: 'orphan', created_at: '' },
      ]);
    });

    it('ignores stray files in the projects directory', async () => {
      await projects.createProject(USER, 'alpha');
      await store.writeFile([USER, 'projects', 'notes.txt'], 'x');

      expect((await projects.listProjects(USER)).map((p) => p.name)).toEqual(['alpha']);
    });
  });

  describe('getProject', () => {
    it('returns the info or NotFoundError', async () => {
      await projects.createProject(USER, 'thesis');

      expect(await projects.getProject(USER, 'thesis')).toEqual({
        name: 'thesis',
        created_at: '2024-05-01T12:00:00.000Z',
      });
      await expect(projects.getProject(USER, 'missing')).rejects.toThrow(new NotFoundError("Project 'missing' not found"));
    });
  });

  describe('files', () => {
    beforeEach(async () => {
      await projects.createProject(USER, 'thesis');
    });

    it('stores uploads and reads them back byte for byte', async () => {
      const content = Buffer.from('%PDF-1.4 fake bytes\n\u0000ÿ');
      const stored = await projects.upload(USER, 'thesis', 'temp', 'draft.pdf', content);

      expect(stored).toEqual({ folder: 'temp', filename: 'draft.pdf', size: content.length });
      const read = await projects.readFile(USER, 'thesis', 'draft.pdf');
      expect(read.folder).toBe('temp');
      expect(read.content.equals(content)).toBe(true);
    });

    it('lists each folder sorted, and listing twice changes nothing', async () => {
      await projects.upload(USER, 'thesis', 'temp', 'b.txt', Buffer.from('b'));
      await projects.upload(USER, 'thesis', 'temp', 'a.txt', Buffer.from('a'));
      await projects.upload(USER, 'thesis', 'main', 'c.txt', Buffer.from('c'));

      const first = await projects.listFiles(USER, 'thesis');
      const second = await projects.listFiles(USER, 'thesis');

      expect(first).toEqual({ main: ['c.txt'], temp: ['a.txt', 'b.txt'] });
      expect(second).toEqual(first);
    });

    it('lists a missing folder as empty', async () => {
      await store.remove([USER, 'projects', 'thesis', 'main'], { recursive: true });
      expect(await projects.listFiles(USER, 'thesis')).toEqual({ main: [], temp: [] });
    });

    it('overwrites an upload with the same name', async () => {
      await projects.upload(USER, 'thesis', 'temp', 'a.txt', Buffer.from('first'));
      await projects.upload(USER, 'thesis', 'temp', 'a.txt', Buffer.from('second'));

      expect((await projects.readFile(USER, 'thesis', 'a.txt')).content.toString()).toBe('second');
    });

    it('rejects unknown folders with a 400 and unknown projects with a 404', async () => {
      await expect(projects.upload(USER, 'thesis', 'archive', 'a.txt', Buffer.from('x'))).rejects.toMatchObject({
        statusCode: 400,
        message: "Invalid folder 'archive': must be one of main, temp",
      });
      await expect(projects.upload(USER, 'missing', 'temp', 'a.txt', Buffer.from('x'))).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it.each(['../escape.txt', '..', 'sub/dir.txt', '.~reserved.tmp'])('rejects the filename %j', async (filename) => {
      await expect(projects.upload(USER, 'thesis', 'temp', filename, Buffer.from('x'))).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rejects a traversal filename before touching storage', async () => {
      const kind = vi.spyOn(store, 'kind');
      const read = vi.spyOn(store, 'readFile');

      await expect(projects.upload(USER, 'thesis', 'temp', '../x', Buffer.from('x'))).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(projects.readFile(USER, 'thesis', '../x')).rejects.toBeInstanceOf(ValidationError);
      await expect(projects.deleteFile(USER, 'thesis', '..')).rejects.toBeInstanceOf(ValidationError);
      await expect(projects.moveToMain(USER, 'thesis', 'a/b')).rejects.toBeInstanceOf(ValidationError);

      expect(kind).not.toHaveBeenCalled();
      expect(read).not.toHaveBeenCalled();
    });

    it('lists an upload whose name looks like a temporary file', async () => {
      const name = 'x.123e4567-e89b-42d3-a456-426614174000.tmp';
      await projects.upload(USER, 'thesis', 'temp', name, Buffer.from('kept'));

      expect(await projects.listFiles(USER, 'thesis')).toEqual({ main: [], temp: [name] });
    });

    it('prefers main/ over temp/ when reading and deleting', async () => {
      await projects.upload(USER, 'thesis', 'temp', 'same.txt', Buffer.from('staged'));
      await projects.upload(USER, 'thesis', 'main', 'same.txt', Buffer.from('committed'));

      const read = await projects.readFile(USER, 'thesis', 'same.txt');
      expect(read).toMatchObject({ folder: 'main' });
      expect(read.content.toString()).toBe('committed');

      expect(await projects.deleteFile(USER, 'thesis', 'same.txt')).toBe('main');
      expect(await projects.deleteFile(USER, 'thesis', 'same.txt')).toBe('temp');
      await expect(projects.deleteFile(USER, 'thesis', 'same.txt')).rejects.toThrow(
        new NotFoundError("File 'same.txt' not found in project 'thesis'")
      );
    });

    it('moves a staged file into main/, replacing a committed one', async () => {
      await projects.upload(USER, 'thesis', 'main', 'doc.txt', Buffer.from('old'));
      await projects.upload(USER, 'thesis', 'temp', 'doc.txt', Buffer.from('new'));

      await projects.moveToMain(USER, 'thesis', 'doc.txt');

      expect(await projects.listFiles(USER, 'thesis')).toEqual({ main: ['doc.txt'], temp: [] });
      expect((await projects.readFile(USER, 'thesis', 'doc.txt')).content.toString()).toBe('new');
    });

    it('refuses to move a file that is not staged', async () => {
      await projects.upload(USER, 'thesis', 'main', 'doc.txt', Buffer.from('committed'));

      await expect(projects.moveToMain(USER, 'thesis', 'doc.txt')).rejects.toThrow(
        new NotFoundError("File 'doc.txt' not found in temp folder of project 'thesis'")
      );
    });
  });

  it('builds the folder structure for every project', async () => {
    await projects.createProject(USER, 'alpha');
    clock.advance(1000);
    await projects.createProject(USER, 'beta');
    await projects.upload(USER, 'alpha', 'temp', 'a.txt', Buffer.from('a'));

    expect(await projects.getFolderStructure(USER)).toEqual({
      beta: { main: [], temp: [] },
      alpha: { main: [], temp: ['a.txt'] },
    });
  });
});
