import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';

export const MARKUP_FILE = 'picking.html';
export const DOCUMENT_FILE = 'picking.pdf';
export const REPORT_FILE = 'report.json';
export const CODE_DIR = 'codes';

interface FileChange {
  target: string;
  /** Previous content moved aside, or null when the run created the file. */
  backup: string | null;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

function siblingPath(target: string, suffix = ''): string {
  return path.join(path.dirname(target), `.${crypto.randomBytes(4).toString('hex')}.${path.basename(target)}${suffix}`);
}

/**
 * Owns every path and write of a single run. Files land at their canonical
 * location only through a rename, so readers never see a partial file.
 * Until `finalize()`, every change can be undone with `rollback()`.
 */
export class OutputDirectory {
  readonly root: string;
  private readonly changes: FileChange[] = [];
  private readonly createdDirs: string[] = [];

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(relativePath: string): string {
    const target = path.resolve(this.root, relativePath);
    const relative = path.relative(this.root, target);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Path is outside the output directory: ${relativePath}`);
    }
    return target;
  }

  get markupPath(): string {
    return this.resolve(MARKUP_FILE);
  }

  get documentPath(): string {
    return this.resolve(DOCUMENT_FILE);
  }

  get reportPath(): string {
    return this.resolve(REPORT_FILE);
  }

  codeFile(fileName: string): string {
    return path.posix.join(CODE_DIR, fileName);
  }

  async exists(relativePath: string): Promise<boolean> {
    return fileExists(this.resolve(relativePath));
  }

  async writeFile(relativePath: string, data: string | Buffer): Promise<string> {
    return this.commit(relativePath, tempPath => fs.writeFile(tempPath, data));
  }

  private async ensureDirectory(dir: string): Promise<void> {
    const missing: string[] = [];
    for (let current = dir; !(await pathExists(current)); current = path.dirname(current)) {
      missing.push(current);
      if (path.dirname(current) === current) {
        break;
      }
    }
    await fs.mkdir(dir, { recursive: true });
    this.createdDirs.push(...missing);
  }

  /**
   * Lets `producer` write to a temporary sibling of the target, then renames it
   * into place. A file already at the target is moved aside first so that
   * `rollback()` can put it back.
   */
  async commit(relativePath: string, producer: (tempPath: string) => Promise<void>): Promise<string> {
    const target = this.resolve(relativePath);
    await this.ensureDirectory(path.dirname(target));
    const tempPath = siblingPath(target);

    try {
      await producer(tempPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    // A second write to the same target keeps the backup of the first one.
    const tracked = this.changes.some(change => change.target === target);
    let backup: string | null = null;
    if (!tracked && (await fileExists(target))) {
      backup = siblingPath(target, '.bak');
      await fs.rename(target, backup);
    }

    try {
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      if (backup) {
        await fs.rename(backup, target);
      }
      throw error;
    }

    if (!tracked) {
      this.changes.push({ target, backup });
    }
    return target;
  }

  createdFiles(): string[] {
    return this.changes.filter(change => change.backup === null).map(change => change.target);
  }

  /**
   * Undoes every change, newest first: created files are removed, overwritten
   * ones get their previous content back, and directories the run created are
   * removed once empty. Returns the files touched.
   */
  async rollback(): Promise<string[]> {
    const changes = this.changes.splice(0).reverse();
    for (const change of changes) {
      if (change.backup) {
        await fs.rename(change.backup, change.target);
      } else {
        await fs.rm(change.target, { force: true });
      }
    }

    const dirs = this.createdDirs.splice(0).sort((a, b) => b.length - a.length);
    for (const dir of dirs) {
      if (!(await pathExists(dir))) {
        continue;
      }
      const entries = await fs.readdir(dir);
      if (entries.length === 0) {
        await fs.rmdir(dir);
      }
    }
    return changes.map(change => change.target);
  }

  /** Keeps the run's files and drops the backups of what they replaced. */
  async finalize(): Promise<void> {
    const backups = this.changes.splice(0).flatMap(change => (change.backup ? [change.backup] : []));
    this.createdDirs.length = 0;
    for (const backup of backups) {
      await fs.rm(backup, { force: true });
    }
  }
}
