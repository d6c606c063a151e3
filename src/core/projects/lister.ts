/**
 * Listing of the project directories under the configured projects dir.
 */
import * as path from 'node:path';
import { getStats, isDirectory, listSubdirectories } from '../../utils/file-system.js';

export interface ProjectInfo {
  name: string;
  path: string;
  modified: Date;
}

/**
 * Projects (immediate sub-directories) of `projectsDir`, sorted by name.
 * Returns null when the directory does not exist.
 */
export async function listProjects(projectsDir: string): Promise<ProjectInfo[] | null> {
  const root = path.resolve(projectsDir);
  if (!(await isDirectory(root))) {
    return null;
  }

  const projects: ProjectInfo[] = [];
  for (const name of await listSubdirectories(root)) {
    const projectPath = path.join(root, name);
    const stats = await getStats(projectPath);
    projects.push({ name, path: projectPath, modified: stats.mtime });
  }
  return projects;
}

/**
 * Format a modification time as `YYYY-MM-DD HH:mm` in local time.
 */
export function formatModified(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
