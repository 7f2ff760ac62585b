/**
 * @fileoverview Staging tree writer
 *
 * Regenerated records never go into the live database. They are written to a
 * staging tree with the same `category/PF/RECORD` layout, for the operator to
 * inspect and copy over.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EmptyRecordError, StagingPathError } from '../core/errors.js';

export interface StagingWriterOptions {
  /** Database root that absolute package paths are rewritten from. */
  databaseRoot: string;
  /** Staging root; a fresh temporary directory when omitted. */
  root?: string;
}

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative.length > 0 && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

function assertSeparate(root: string, databaseRoot: string): void {
  if (root === databaseRoot || isInside(databaseRoot, root) || isInside(root, databaseRoot)) {
    throw new StagingPathError(
      root,
      root,
      `Staging root ${root} overlaps the package database ${databaseRoot}; choose an output directory outside it`,
    );
  }
}

export class StagingWriter {
  private constructor(
    readonly root: string,
    readonly databaseRoot: string,
  ) {}

  /**
   * Raises StagingPathError when the staging root and the database overlap
   * (equal, or either one inside the other).
   */
  static async create(options: StagingWriterOptions): Promise<StagingWriter> {
    const databaseRoot = path.resolve(options.databaseRoot);

    if (options.root) {
      const root = path.resolve(options.root);
      assertSeparate(root, databaseRoot);
      await fs.mkdir(root, { recursive: true });
      return new StagingWriter(root, databaseRoot);
    }

    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'vdb-elf-recover-'));
    try {
      assertSeparate(root, databaseRoot);
    } catch (error) {
      await fs.rm(root, { recursive: true, force: true });
      throw error;
    }
    return new StagingWriter(root, databaseRoot);
  }

  /**
   * Map a package directory (absolute under the database root, or relative
   * `category/PF`) and a record name to its location in the staging tree.
   */
  resolveTarget(packagePath: string, recordName: string): string {
    if (!recordName || recordName.includes('/') || recordName.includes(path.sep) || recordName === '..' || recordName === '.') {
      throw new StagingPathError(path.join(packagePath, recordName), this.root);
    }

    let relative = packagePath;
    if (path.isAbsolute(packagePath)) {
      const resolved = path.resolve(packagePath);
      if (!isInside(this.databaseRoot, resolved)) {
        throw new StagingPathError(packagePath, this.root);
      }
      relative = path.relative(this.databaseRoot, resolved);
    }

    const target = path.resolve(this.root, relative, recordName);
    if (!isInside(this.root, target)) {
      throw new StagingPathError(target, this.root);
    }
    return target;
  }

  /**
   * Write one record, creating intermediate directories. Returns the path
   * written. Empty content raises EmptyRecordError.
   */
  async write(packagePath: string, recordName: string, content: string): Promise<string> {
    const target = this.resolveTarget(packagePath, recordName);
    if (content.length === 0) {
      throw new EmptyRecordError(packagePath, recordName);
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
    return target;
  }
}
