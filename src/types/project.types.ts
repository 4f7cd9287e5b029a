export const PROJECT_FOLDERS = ['main', 'temp'] as const;

/** main holds committed files, temp holds staged uploads */
export type ProjectFolder = (typeof PROJECT_FOLDERS)[number];

export function isProjectFolder(value: string): value is ProjectFolder {
  return (PROJECT_FOLDERS as readonly string[]).includes(value);
}

export interface ProjectInfo {
  name: string;
  /** ISO timestamp, or '' when the info record is missing or unreadable */
  created_at: string;
}

export interface FileListing {
  main: string[];
  temp: string[];
}

export type FolderStructure = Record<string, FileListing>;

export interface StoredFile {
  folder: ProjectFolder;
  content: Buffer;
}
