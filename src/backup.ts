import fs from "node:fs";
import path from "node:path";
import * as tar from "tar";
import { OpsError } from "./errors.js";
import { assertSafeRoot } from "./fileset.js";
import { errorMessage, timestamp } from "./utils.js";

export type BackupEntry = {
   name: string;
   path: string;
   /** YYYYMMDD_HHMMSS */
   stamp: string;
   createdAt: Date;
   size: number;
   /** Database dump taken alongside, when one exists */
   databaseDump?: string;
};

const STAMP = /(\d{8}_\d{6})_files\.tar\.gz$/;

export function archiveName(prefix: string, now: Date = new Date()): string {
   return `${prefix}_${timestamp(now)}_files.tar.gz`;
}

/** `<stem>_files.tar.gz` -> `<stem>_database.sql` */
export function databaseDumpPath(archive: string): string {
   return archive.replace(/_files\.tar\.gz$/, "_database.sql");
}

function stampToDate(stamp: string): Date {
   const m = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/.exec(stamp);
   if (!m) return new Date(NaN);
   return new Date(Number(m[1]), Number(m[2]) - 1, Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6]));
}

/**
 * Tarball of the whole web root, dotfiles included, paths relative to the root.
 */
export async function createBackup(webRoot: string, dir: string, prefix: string, now: Date = new Date()): Promise<string> {
   const root = path.resolve(webRoot);
   if (!fs.existsSync(root)) throw OpsError.backupFailed(`Web root ${root} does not exist`);
   const dest = path.resolve(dir);
   if (dest === root || dest.startsWith(root + path.sep)) {
      throw OpsError.backupFailed(`Backup directory ${dest} must not be inside the web root`);
   }
   await fs.promises.mkdir(dest, { recursive: true });
   const file = path.join(dest, archiveName(prefix, now));
   try {
      await tar.c({ gzip: true, file, cwd: root, portable: false }, ["."]);
   } catch (e) {
      await fs.promises.rm(file, { force: true });
      throw OpsError.backupFailed(`Could not archive ${root}: ${errorMessage(e)}`, e);
   }
   return file;
}

/** Backups for this prefix, newest first. */
export async function listBackups(dir: string, prefix: string): Promise<BackupEntry[]> {
   let names: string[];
   try {
      names = await fs.promises.readdir(dir);
   } catch {
      return [];
   }
   const out: BackupEntry[] = [];
   for (const name of names) {
      if (!name.startsWith(`${prefix}_`)) continue;
      const m = STAMP.exec(name);
      // exact prefix: backup_a.com must not pick up backup_a.com.au
      if (!m || m[1] === undefined || name !== `${prefix}_${m[1]}_files.tar.gz`) continue;
      const full = path.join(dir, name);
      const st = await fs.promises.stat(full);
      const dump = databaseDumpPath(full);
      out.push({
         name,
         path: full,
         stamp: m[1],
         createdAt: stampToDate(m[1]),
         size: st.size,
         databaseDump: fs.existsSync(dump) ? dump : undefined,
      });
   }
   return out.sort((a, b) => b.stamp.localeCompare(a.stamp));
}

/** Rollback's own archive of the site it replaces; kept apart so "latest" never picks it. */
export function safetyPrefix(prefix: string): string {
   return `${prefix}_safety`;
}

export function assertRetain(retain: number): void {
   if (!Number.isInteger(retain) || retain < 1) {
      throw OpsError.configInvalid(`retain must be a whole number of at least 1 (got ${retain})`);
   }
}

/** Keep the newest `retain` backups; returns the removed archives. */
export async function pruneBackups(dir: string, prefix: string, retain: number): Promise<string[]> {
   assertRetain(retain);
   const all = await listBackups(dir, prefix);
   const doomed = all.slice(retain);
   for (const b of doomed) {
      await fs.promises.rm(b.path, { force: true });
      if (b.databaseDump) await fs.promises.rm(b.databaseDump, { force: true });
   }
   return doomed.map((b) => b.path);
}

/** Accept a bare file name from `backup ls` or a full path. */
export async function findBackup(dir: string, prefix: string, nameOrPath?: string): Promise<BackupEntry | null> {
   const all = await listBackups(dir, prefix);
   if (!nameOrPath) return all[0] ?? null;
   const base = path.basename(nameOrPath);
   return all.find((b) => b.name === base || b.path === path.resolve(nameOrPath) || b.stamp === nameOrPath) ?? null;
}

export type RestoreOptions = {
   /** Empty the web root before extracting */
   clean?: boolean;
};

export async function restoreBackup(archive: string, webRoot: string, opts: RestoreOptions = {}): Promise<void> {
   const root = assertSafeRoot(webRoot);
   if (!fs.existsSync(archive)) throw OpsError.restoreFailed(`Backup ${archive} not found`);
   try {
      if (opts.clean && fs.existsSync(root)) {
         for (const entry of await fs.promises.readdir(root)) {
            await fs.promises.rm(path.join(root, entry), { recursive: true, force: true });
         }
      }
      await fs.promises.mkdir(root, { recursive: true });
      await tar.x({ file: archive, cwd: root });
   } catch (e) {
      throw OpsError.restoreFailed(`Could not restore ${path.basename(archive)} into ${root}: ${errorMessage(e)}`, e);
   }
}
