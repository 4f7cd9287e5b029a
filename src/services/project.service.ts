import { z } from 'zod';
import { StoreEntry, StorePath, TreeStore } from '../storage/store.types';
import { assertSafeSegment } from '../storage/filesystem.store';
import {
  FileListing,
  FolderStructure,
  PROJECT_FOLDERS,
  ProjectFolder,
  ProjectInfo,
  StoredFile,
  isProjectFolder,
} from '../types/project.types';
import {
  AppError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../middleware/error.middleware';
import { PROJECT_NAME_PATTERN, parseOrThrow, projectNameSchema } from '../utils/validation.utils';
import { logger } from '../utils/logger';
import { Clock } from './auth.service';
import { PROJECTS_DIR } from './user.service';

export const PROJECT_INFO_FILE = 'project_info.json';

const projectInfoSchema = z.object({
  created_at: z.string(),
});

/**
 * Per-user project namespace.
 *
 * Layout under the users root:
 *   <username>/projects/<project>/project_info.json
 *   <username>/projects/<project>/main/<file>   committed files
 *   <username>/projects/<project>/temp/<file>   staged uploads
 *
 * Every path goes through the TreeStore, which confines it to the root.
 */
export class ProjectService {
  private readonly store: TreeStore;
  private readonly clock: Clock;

  constructor(store: TreeStore, clock: Clock = Date.now) {
    this.store = store;
    this.clock = clock;
  }

  /**
   * Create a project with empty main/ and temp/ folders.
   * All-or-nothing: a failure after the project directory was created by
   * this call removes it again. A directory that already existed (including
   * one a concurrent request just created) is never touched.
   */
  async createProject(username: string, name: string): Promise<ProjectInfo> {
    const projectName = parseOrThrow(projectNameSchema, name);
    const projectPath = this.projectPath(username, projectName);

    await this.store.makeDirectory([username, PROJECTS_DIR]);

    try {
      await this.store.makeDirectory(projectPath, { exclusive: true });
    } catch (error) {
      if (error instanceof ConflictError) {
        throw new ConflictError(`Project '${projectName}' already exists`);
      }
      throw error;
    }

    const info: ProjectInfo = {
      name: projectName,
      created_at: new Date(this.clock()).toISOString(),
    };

    try {
      for (const folder of PROJECT_FOLDERS) {
        await this.store.makeDirectory([...projectPath, folder], { exclusive: true });
      }
      await this.store.writeFile(
        [...projectPath, PROJECT_INFO_FILE],
        JSON.stringify({ created_at: info.created_at }, null, 2),
        { exclusive: true }
      );
    } catch (error) {
      await this.rollback(username, projectName);
      throw error;
    }

    logger.info(`Project created: ${username}/${projectName}`);
    return info;
  }

  /**
   * Projects sorted newest first. A project whose info record is missing or
   * unreadable is listed with an empty created_at.
   */
  async listProjects(username: string): Promise<ProjectInfo[]> {
    let entries: StoreEntry[];
    try {
      entries = await this.store.list([username, PROJECTS_DIR]);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return [];
      }
      throw error;
    }

    const projects = await Promise.all(
      entries
        .filter((entry) => entry.kind === 'directory' && PROJECT_NAME_PATTERN.test(entry.name))
        .map(async (entry): Promise<ProjectInfo> => ({
          name: entry.name,
          created_at: await this.readCreatedAt(username, entry.name),
        }))
    );

    return projects.sort((a, b) => {
      if (a.created_at !== b.created_at) {
        return a.created_at < b.created_at ? 1 : -1;
      }
      return a.name.localeCompare(b.name);
    });
  }

  /**
   * Info for a single project
   */
  async getProject(username: string, name: string): Promise<ProjectInfo> {
    const projectName = await this.requireProject(username, name);
    return {
      name: projectName,
      created_at: await this.readCreatedAt(username, projectName),
    };
  }

  /**
   * File names in main/ and temp/, each sorted. A missing folder lists as
   * empty.
   */
  async listFiles(username: string, project: string): Promise<FileListing> {
    const projectName = await this.requireProject(username, project);
    const projectPath = this.projectPath(username, projectName);

    return {
      main: await this.listFolder([...projectPath, 'main']),
      temp: await this.listFolder([...projectPath, 'temp']),
    };
  }

  /**
   * Write a file into one of the project's folders, creating the folder if
   * needed. An existing file with the same name is overwritten.
   */
  async upload(
    username: string,
    project: string,
    folder: string,
    filename: string,
    content: Buffer
  ): Promise<{ folder: ProjectFolder; filename: string; size: number }> {
    if (!isProjectFolder(folder)) {
      throw new ValidationError(`Invalid folder '${folder}': must be one of ${PROJECT_FOLDERS.join(', ')}`, 400);
    }
    assertSafeSegment(filename);
    const projectName = await this.requireProject(username, project);

    await this.store.writeFile([...this.projectPath(username, projectName), folder, filename], content);

    logger.info(`File uploaded: ${username}/${projectName}/${folder}/${filename}`, {
      size: content.length,
    });
    return { folder, filename, size: content.length };
  }

  /**
   * Read a file, looking in main/ first and then temp/
   */
  async readFile(username: string, project: string, filename: string): Promise<StoredFile> {
    assertSafeSegment(filename);
    const projectName = await this.requireProject(username, project);
    const folder = await this.locate(username, projectName, filename);

    const content = await this.store.readFile([...this.projectPath(username, projectName), folder, filename]);
    return { folder, content };
  }

  /**
   * Delete the first match for a filename (main/ before temp/)
   */
  async deleteFile(username: string, project: string, filename: string): Promise<ProjectFolder> {
    assertSafeSegment(filename);
    const projectName = await this.requireProject(username, project);
    const folder = await this.locate(username, projectName, filename);

    await this.store.remove([...this.projectPath(username, projectName), folder, filename]);

    logger.info(`File deleted: ${username}/${projectName}/${folder}/${filename}`);
    return folder;
  }

  /**
   * Promote a staged file from temp/ to main/, replacing any committed file
   * with the same name
   */
  async moveToMain(username: string, project: string, filename: string): Promise<void> {
    assertSafeSegment(filename);
    const projectName = await this.requireProject(username, project);
    const projectPath = this.projectPath(username, projectName);
    const source = [...projectPath, 'temp', filename];

    if ((await this.store.kind(source)) !== 'file') {
      throw new NotFoundError(`File '${filename}' not found in temp folder of project '${projectName}'`);
    }

    await this.store.move(source, [...projectPath, 'main', filename]);
    logger.info(`File moved to main: ${username}/${projectName}/${filename}`);
  }

  /**
   * Every project with its folder listings, as handed to the supervisor
   */
  async getFolderStructure(username: string): Promise<FolderStructure> {
    const structure: FolderStructure = {};
    for (const project of await this.listProjects(username)) {
      structure[project.name] = await this.listFiles(username, project.name);
    }
    return structure;
  }

  private projectPath(username: string, project: string): StorePath {
    return [username, PROJECTS_DIR, project];
  }

  private async requireProject(username: string, name: string): Promise<string> {
    const projectName = parseOrThrow(projectNameSchema, name, 400);
    if ((await this.store.kind(this.projectPath(username, projectName))) !== 'directory') {
      throw new NotFoundError(`Project '${projectName}' not found`);
    }
    return projectName;
  }

  private async locate(username: string, project: string, filename: string): Promise<ProjectFolder> {
    for (const folder of PROJECT_FOLDERS) {
      if ((await this.store.kind([...this.projectPath(username, project), folder, filename])) === 'file') {
        return folder;
      }
    }
    throw new NotFoundError(`File '${filename}' not found in project '${project}'`);
  }

  private async listFolder(folderPath: StorePath): Promise<string[]> {
    try {
      const entries = await this.store.list(folderPath);
      return entries
        .filter((entry) => entry.kind === 'file')
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (error instanceof NotFoundError) {
        return [];
      }
      throw error;
    }
  }

  private async readCreatedAt(username: string, project: string): Promise<string> {
    try {
      const raw = await this.store.readFile([...this.projectPath(username, project), PROJECT_INFO_FILE]);
      const parsed = projectInfoSchema.safeParse(JSON.parse(raw.toString('utf-8')));
      return parsed.success ? parsed.data.created_at : '';
    } catch (error) {
      logger.warn(`Project info unavailable for ${username}/${project}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return '';
    }
  }

  private async rollback(username: string, project: string): Promise<void> {
    try {
      await this.store.remove(this.projectPath(username, project), { recursive: true });
      logger.warn(`Rolled back partially created project: ${username}/${project}`);
    } catch (error) {
      logger.error(`Rollback failed for project: ${username}/${project}`, {
        error: error instanceof AppError ? error.message : 'Unknown error',
      });
    }
  }
}
