import fs from "node:fs";
import path from "node:path";
import cliProgress from "cli-progress";
import { globby } from "globby";
import picomatch from "picomatch";
import { OpsError } from "./errors.js";
import type { CommandRunner } from "./exec.js";
import type { ResolvedConfig } from "./types.js";
import { normRel, pathExistsSync } from "./utils.js";

/**
 * Refuse to bulk-delete in "/" or a top-level directory such as /var.
 */
export function assertSafeRoot(dir: string): string {
   const abs = path.resolve(dir);
   const depth = abs.split(path.sep).filter(Boolean).length;
   if (depth < 2) throw OpsError.configInvalid(`Refusing to modify ${abs}: web root must be at least two levels deep`);
   return abs;
}

/** Join a relative entry to root, rejecting anything that would land outside it. */
export function inside(root: string, rel: string): string {
   const full = path.resolve(root, rel);
   const r = path.relative(root, full);
   if (!r || r.startsWith("..") || path.isAbsolute(r)) {
      throw OpsError.configInvalid(`Path "${rel}" escapes ${root}`);
   }
   return full;
}

export type CleanOptions = { dryRun?: boolean };

/**
 * Remove leftovers of a previous site. Junk patterns never reach into storage/
 * (Laravel's own logs and cache live there) or vendor/.
 */
export async function cleanLeftovers(webRoot: string, clean: ResolvedConfig["clean"], opts: CleanOptions = {}): Promise<string[]> {
   const root = assertSafeRoot(webRoot);
   if (!fs.existsSync(root)) return [];
   const removed: string[] = [];

   for (const rel of [...clean.dirs, ...clean.files]) {
      const full = inside(root, rel);
      if (!pathExistsSync(full)) continue;
      if (!opts.dryRun) await fs.promises.rm(full, { recursive: true, force: true });
      removed.push(normRel(rel));
   }

   const junk = await globby(clean.patterns, {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: ["storage/**", "vendor/**", "node_modules/**"],
   });
   for (const rel of junk.sort()) {
      if (!opts.dryRun) await fs.promises.rm(path.join(root, rel), { force: true });
      removed.push(rel);
   }
   return removed;
}

/** Copy each existing preserved path into `stash`; returns what was stashed. */
export async function stashPreserved(webRoot: string, preserve: string[], stash: string): Promise<string[]> {
   const kept: string[] = [];
   for (const rel of preserve) {
      const from = inside(webRoot, rel);
      if (!pathExistsSync(from)) continue;
      const to = inside(stash, rel);
      await fs.promises.mkdir(path.dirname(to), { recursive: true });
      await fs.promises.cp(from, to, { recursive: true, verbatimSymlinks: true });
      kept.push(normRel(rel));
   }
   return kept;
}

/** Put stashed paths back over whatever the release brought. */
export async function restorePreserved(stash: string, webRoot: string, kept: string[]): Promise<void> {
   for (const rel of kept) {
      const from = inside(stash, rel);
      const to = inside(webRoot, rel);
      await fs.promises.rm(to, { recursive: true, force: true });
      await fs.promises.mkdir(path.dirname(to), { recursive: true });
      await fs.promises.cp(from, to, { recursive: true, verbatimSymlinks: true });
   }
}

export type CopyOptions = {
   progress?: boolean;
   dryRun?: boolean;
};

export type CopyResult = { copied: number; excluded: number };

/** Relative paths of every file in the release after exclude globs */
export async function releaseFiles(sourceDir: string, exclude: string[]): Promise<{ files: string[]; excluded: number }> {
   const all = await globby("**/*", { cwd: sourceDir, dot: true, onlyFiles: true, followSymbolicLinks: false });
   const isExcluded = exclude.length ? picomatch(exclude, { dot: true }) : () => false;
   const files = all.filter((f) => !isExcluded(f)).sort();
   return { files, excluded: all.length - files.length };
}

export async function copyRelease(sourceDir: string, webRoot: string, exclude: string[], opts: CopyOptions = {}): Promise<CopyResult> {
   const src = path.resolve(sourceDir);
   const dest = assertSafeRoot(webRoot);
   if (src === dest) throw OpsError.configInvalid("sourceDir and webRoot are the same directory");
   if (!fs.existsSync(src)) throw OpsError.prerequisiteMissing(`Release directory ${src}`);

   const { files, excluded } = await releaseFiles(src, exclude);
   if (opts.dryRun) return { copied: files.length, excluded };

   const bar = opts.progress && files.length
      ? new cliProgress.SingleBar({ format: "  copy [{bar}] {value}/{total} files", hideCursor: true }, cliProgress.Presets.shades_classic)
      : null;
   bar?.start(files.length, 0);

   let copied = 0;
   try {
      for (const rel of files) {
         const to = path.join(dest, rel);
         await fs.promises.mkdir(path.dirname(to), { recursive: true });
         await fs.promises.copyFile(path.join(src, rel), to);
         copied++;
         bar?.increment();
      }
   } finally {
      bar?.stop();
   }
   return { copied, excluded };
}

export type PermissionSummary = { files: number; dirs: number };

/**
 * Files 0644, directories 0755, `artisan` 0755, and everything under the
 * writable trees 0775. Symlinks are left alone.
 */
export async function applyModes(webRoot: string, writableDirs: string[]): Promise<PermissionSummary> {
   const root = assertSafeRoot(webRoot);
   const writable = writableDirs.map((d) => inside(root, d));
   const summary: PermissionSummary = { files: 0, dirs: 0 };

   const isWritable = (p: string) => writable.some((w) => p === w || p.startsWith(w + path.sep));

   async function walk(dir: string) {
      const entries = await fs.promises.readdir(dir, { withFileTypes: true });
      for (const e of entries) {
         const full = path.join(dir, e.name);
         if (e.isSymbolicLink()) continue;
         if (e.isDirectory()) {
            await fs.promises.chmod(full, isWritable(full) ? 0o775 : 0o755);
            summary.dirs++;
            await walk(full);
         } else if (e.isFile()) {
            const exec = full === path.join(root, "artisan");
            await fs.promises.chmod(full, isWritable(full) ? 0o775 : exec ? 0o755 : 0o644);
            summary.files++;
         }
      }
   }

   await fs.promises.chmod(root, 0o755);
   await walk(root);
   return summary;
}

/** Modes on disk, then `chown -R user:group` through the runner. */
export async function applyPermissions(
   runner: CommandRunner,
   webRoot: string,
   owner: { user: string; group: string },
   writableDirs: string[],
   opts: { dryRun?: boolean } = {},
): Promise<PermissionSummary> {
   const summary = opts.dryRun ? { files: 0, dirs: 0 } : await applyModes(webRoot, writableDirs);
   await runner.run("chown", ["-R", `${owner.user}:${owner.group}`, assertSafeRoot(webRoot)]);
   return summary;
}
