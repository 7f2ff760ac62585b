/**
 * @fileoverview Install-root path mapping
 *
 * CONTENTS and NEEDED records name files as they appear on the target system
 * (`/usr/lib64/libfoo.so.1`); on disk they live under the install root, which
 * is `/` unless the database describes an offset image.
 */

import * as path from 'path';

export function resolveInstallPath(root: string, installedPath: string): string {
  return path.join(path.resolve(root), installedPath);
}

/**
 * Inverse of resolveInstallPath. Paths outside the root are returned
 * unchanged.
 */
export function toInstallPath(root: string, absolutePath: string): string {
  const resolvedRoot = path.resolve(root);
  if (resolvedRoot === path.sep) return absolutePath;
  const relative = path.relative(resolvedRoot, absolutePath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) return absolutePath;
  return path.sep + relative;
}
