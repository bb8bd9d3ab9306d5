import { dirname, join, resolve } from "node:path";

/** Absolute parent directory of a path. The root is its own parent. */
export function parentDir(path: string): string {
  return dirname(resolve(path));
}

/**
 * Backup directory used when none is given: a `backups` directory beside the
 * server root's parent, e.g. `/srv/mc/survival` -> `/srv/backups`.
 */
export function defaultBackupDir(root: string): string {
  return join(parentDir(parentDir(root)), "backups");
}
