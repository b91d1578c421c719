import { stat } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { ConfigError, NotFoundError } from '@workdrive-upload/sdk';

export interface PathOptions {
  cwd: string;
  /** Allowed root; set from GITHUB_WORKSPACE inside CI. */
  workspace?: string;
}

function isInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves one path to an absolute file path inside the allowed root.
 * @throws {NotFoundError}
 */
export async function resolveFilePath(filePath: string, options: PathOptions): Promise<string> {
  const absolute = path.resolve(options.cwd, filePath);
  const exists = await isFile(absolute);

  if (options.workspace) {
    const workspace = path.resolve(options.workspace);
    if (!isInside(absolute, workspace)) {
      throw new NotFoundError(
        `${exists ? 'File is outside the workspace' : 'File not found'}: ${absolute}. ` +
          `Docker-based GitHub Actions only see files inside the workspace (${workspace}); ` +
          'create the file under the workspace and pass a path relative to it.',
        absolute
      );
    }
    if (!exists) {
      throw new NotFoundError(`File not found in workspace: ${absolute}`, absolute);
    }
    return absolute;
  }

  if (!exists) {
    throw new NotFoundError(`File not found: ${absolute}`, absolute);
  }
  return absolute;
}

/**
 * Expands glob patterns (sorted, files only) and resolves plain paths,
 * keeping the order in which the patterns were given.
 * @throws {ConfigError} If a pattern matches nothing.
 * @throws {NotFoundError} If a path is missing or outside the workspace.
 */
export async function resolveFilePaths(patterns: readonly string[], options: PathOptions): Promise<string[]> {
  const resolved: string[] = [];
  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      resolved.push(await resolveFilePath(pattern, options));
      continue;
    }

    const matches = await fg(pattern, { cwd: options.cwd, absolute: true, onlyFiles: true });
    if (matches.length === 0) {
      throw new ConfigError(`No files matched pattern: ${pattern}`);
    }
    for (const match of matches.sort()) {
      resolved.push(await resolveFilePath(match, options));
    }
  }
  return resolved;
}
