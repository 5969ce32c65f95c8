import { homedir } from 'node:os';
import { join } from 'node:path';

export function defaultHomeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? homedir();
}

export function defaultProjectsDir(home: string = defaultHomeDir()): string {
  return join(home, '.claude', 'projects');
}

/**
 * Project directories are named after the path they were opened in, with
 * every `/` turned into `-`. Hyphens in the original path are lost, so this
 * is only a fallback when no event records a `cwd`.
 */
export function decodeProjectDirName(dirName: string): string {
  return dirName.replace(/^-/, '/').replaceAll('-', '/');
}

