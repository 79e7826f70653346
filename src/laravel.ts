import fs from "node:fs";
import path from "node:path";
import type { CommandRunner, RunOptions, RunResult } from "./exec.js";
import { isDirSync, isFileSync } from "./utils.js";

export const STRUCTURE_DIRS = [
   "storage/app/public",
   "storage/framework/cache/data",
   "storage/framework/sessions",
   "storage/framework/views",
   "storage/logs",
   "bootstrap/cache",
];

export const ESSENTIAL_FILES = ["composer.json", "artisan", ".env.example", "public/index.php", "bootstrap/app.php", "config/app.php"];
export const ESSENTIAL_DIRS = ["app", "config", "database", "public", "resources", "routes", "storage", "bootstrap"];

/** Create the writable tree Laravel expects; returns the directories that were missing. */
export async function ensureStructure(root: string): Promise<string[]> {
   const created: string[] = [];
   for (const rel of STRUCTURE_DIRS) {
      const full = path.join(root, rel);
      if (isDirSync(full)) continue;
      await fs.promises.mkdir(full, { recursive: true });
      created.push(rel);
   }
   return created;
}

export function missingEssentials(root: string): string[] {
   return [
      ...ESSENTIAL_FILES.filter((f) => !isFileSync(path.join(root, f))),
      ...ESSENTIAL_DIRS.filter((d) => !isDirSync(path.join(root, d))).map((d) => `${d}/`),
   ];
}

export type CacheState = { config: boolean; routes: boolean; packages: boolean };

export function cacheState(root: string): CacheState {
   const c = (f: string) => isFileSync(path.join(root, "bootstrap/cache", f));
   return { config: c("config.php"), routes: c("routes-v7.php"), packages: c("packages.php") };
}

export type StorageLinkState = "linked" | "missing" | "broken" | "not-a-link";

export function storageLink(root: string): StorageLinkState {
   const link = path.join(root, "public/storage");
   let st: fs.Stats;
   try {
      st = fs.lstatSync(link);
   } catch {
      return "missing";
   }
   if (!st.isSymbolicLink()) return "not-a-link";
   return fs.existsSync(link) ? "linked" : "broken";
}

export type LogEntry = {
   time: string;
   env: string;
   level: string;
   message: string;
   /** Stack trace and other continuation lines */
   context: string;
};

const LOG_LINE = /^\[(\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[+-]\d{2}:?\d{2})?)\]\s+([\w-]+)\.([A-Za-z]+):\s?(.*)$/;

export function parseLaravelLog(text: string): LogEntry[] {
   const entries: LogEntry[] = [];
   for (const line of text.split(/\r?\n/)) {
      const m = LOG_LINE.exec(line);
      if (m) {
         entries.push({ time: m[1] ?? "", env: m[2] ?? "", level: (m[3] ?? "").toUpperCase(), message: m[4] ?? "", context: "" });
         continue;
      }
      const last = entries[entries.length - 1];
      if (last && line) last.context += (last.context ? "\n" : "") + line;
   }
   return entries;
}

const SEVERE = new Set(["ERROR", "CRITICAL", "ALERT", "EMERGENCY"]);

export function isSevere(level: string): boolean {
   return SEVERE.has(level.toUpperCase());
}

/** Severe entries from every *.log under storage/logs, newest last. */
export async function severeLogEntries(root: string): Promise<{ file: string; entries: LogEntry[] }[]> {
   const dir = path.join(root, "storage/logs");
   let names: string[];
   try {
      names = (await fs.promises.readdir(dir)).filter((n) => n.endsWith(".log")).sort();
   } catch {
      return [];
   }
   const out: { file: string; entries: LogEntry[] }[] = [];
   for (const name of names) {
      const text = await fs.promises.readFile(path.join(dir, name), "utf8");
      out.push({ file: name, entries: parseLaravelLog(text).filter((e) => isSevere(e.level)) });
   }
   return out;
}

/**
 * Remembers where a log ended at start() and returns only entries written
 * after that point. A file that shrank in between was rotated and is read whole.
 */
export class LogWatcher {
   private offset = 0;

   constructor(readonly file: string) { }

   async start(): Promise<void> {
      this.offset = await sizeOf(this.file);
   }

   async collect(): Promise<LogEntry[]> {
      const size = await sizeOf(this.file);
      if (size === 0) return [];
      const from = size < this.offset ? 0 : this.offset;
      if (size === from) return [];
      const fh = await fs.promises.open(this.file, "r");
      try {
         const buf = Buffer.alloc(size - from);
         await fh.read(buf, 0, buf.length, from);
         this.offset = size;
         return parseLaravelLog(buf.toString("utf8"));
      } finally {
         await fh.close();
      }
   }
}

async function sizeOf(file: string): Promise<number> {
   try {
      return (await fs.promises.stat(file)).size;
   } catch {
      return 0;
   }
}

export type MigrationStatus = { ran: number; pending: number };

/** Counts rows from both the table layout (Laravel <= 9) and the dotted layout. */
export function parseMigrateStatus(output: string): MigrationStatus {
   let ran = 0;
   let pending = 0;
   for (const line of output.split(/\r?\n/)) {
      const t = line.trim();
      if (/\bRan$/.test(t) || /^\|\s*Yes\s*\|/.test(t)) ran++;
      else if (/\bPending$/.test(t) || /^\|\s*No\s*\|/.test(t)) pending++;
   }
   return { ran, pending };
}

export const CLEAR_COMMANDS = ["config:clear", "route:clear", "view:clear", "cache:clear"];
export const CACHE_COMMANDS = ["config:cache", "route:cache", "view:cache"];

/** `php artisan ...` in the web root, as the site owner */
export class Artisan {
   constructor(
      private readonly runner: CommandRunner,
      readonly root: string,
      private readonly user?: string,
   ) { }

   run(args: string[], opts: RunOptions = {}): Promise<RunResult> {
      return this.runner.run("php", ["artisan", ...args], { cwd: this.root, asUser: this.user, timeoutMs: 300_000, ...opts });
   }

   async version(): Promise<string | null> {
      const r = await this.run(["--version"], { allowFailure: true, readOnly: true, timeoutMs: 60_000 });
      return r.code === 0 ? r.stdout.trim() : null;
   }

   /** Runs each command; returns "cmd: reason" for every one that failed. */
   async runEach(commands: string[]): Promise<string[]> {
      const failures: string[] = [];
      for (const c of commands) {
         const r = await this.run([c], { allowFailure: true });
         if (r.code !== 0) failures.push(`${c}: ${failureReason(r)}`);
      }
      return failures;
   }

   clearCaches(): Promise<string[]> {
      return this.runEach(CLEAR_COMMANDS);
   }

   buildCaches(): Promise<string[]> {
      return this.runEach(CACHE_COMMANDS);
   }

   async migrateStatus(): Promise<(MigrationStatus & { ok: true }) | { ok: false; error: string }> {
      const r = await this.run(["migrate:status"], { allowFailure: true, readOnly: true });
      if (r.code !== 0) return { ok: false, error: failureReason(r) };
      return { ok: true, ...parseMigrateStatus(r.stdout) };
   }
}

/** First line of what the command printed, or its exit code when it printed nothing */
function failureReason(r: RunResult): string {
   return (r.stderr || r.stdout).trim().split(/\r?\n/)[0] || `exit ${r.code}`;
}
