import fs from "node:fs";
import path from "node:path";
import { createBackup, databaseDumpPath, findBackup, listBackups, pruneBackups, restoreBackup, safetyPrefix, type BackupEntry } from "./backup.js";
import { act, detectFpm, requireRoot, type OpsContext } from "./context.js";
import { WRITABLE_DIRS } from "./defaults.js";
import { OpsError } from "./errors.js";
import { applyPermissions } from "./fileset.js";
import { classify, statusCode } from "./http-probe.js";
import { Artisan } from "./laravel.js";
import { MysqlClient } from "./mysql.js";
import { Nginx } from "./nginx.js";
import { runProcedure, type ProcedureResult } from "./procedure.js";
import { confirmOrAbort } from "./prompt.js";
import type { Reporter } from "./reporter.js";
import { Services } from "./services.js";
import { humanSize, isDirSync, isFileSync } from "./utils.js";

export type RollbackOptions = {
   /** Archive name, stamp or path; the newest backup when omitted */
   backup?: string;
   /** Choose from a list when the terminal allows it */
   pick?: boolean;
   /** Archive the current web root first (default true) */
   safetyBackup?: boolean;
   withDatabase?: boolean;
   env?: NodeJS.ProcessEnv;
};

export type RollbackResult = {
   ok: boolean;
   restored: string;
   safetyBackup?: string;
   result: ProcedureResult;
};

export function printBackups(reporter: Reporter, list: BackupEntry[]) {
   list.forEach((b, i) => {
      const db = b.databaseDump ? " +db" : "";
      reporter.plain(`  ${String(i + 1).padStart(2)}. ${b.name}  ${b.createdAt.toLocaleString()}  ${humanSize(b.size)}${db}`);
   });
}

async function chooseBackup(ctx: OpsContext, list: BackupEntry[], opts: RollbackOptions): Promise<BackupEntry> {
   const { cfg } = ctx;
   if (opts.backup) {
      const found = await findBackup(cfg.backup.dir, cfg.backup.prefix, opts.backup);
      if (found) return found;
      // a tarball kept somewhere else
      if (isFileSync(opts.backup) && opts.backup.endsWith("_files.tar.gz")) {
         const dump = databaseDumpPath(path.resolve(opts.backup));
         const st = await fs.promises.stat(opts.backup);
         return {
            name: path.basename(opts.backup),
            path: path.resolve(opts.backup),
            stamp: "",
            createdAt: st.mtime,
            size: st.size,
            databaseDump: fs.existsSync(dump) ? dump : undefined,
         };
      }
      throw OpsError.restoreFailed(`Backup ${opts.backup} not found in ${cfg.backup.dir}`);
   }
   const first = list[0];
   if (!first) throw OpsError.restoreFailed(`No backups named ${cfg.backup.prefix}_* in ${cfg.backup.dir}`);
   if (!opts.pick || !ctx.prompter.interactive) return first;
   const i = await ctx.prompter.select("Choose a backup to restore", list.map((b) => `${b.name} (${humanSize(b.size)})`));
   return list[i] ?? first;
}

export async function handleRollback(ctx: OpsContext, opts: RollbackOptions = {}): Promise<RollbackResult> {
   const { cfg, reporter, runner, prompter } = ctx;
   const env = opts.env ?? process.env;
   requireRoot(ctx, "rollback");

   const list = await listBackups(cfg.backup.dir, cfg.backup.prefix);
   reporter.section(`Backups in ${cfg.backup.dir}`);
   if (list.length) printBackups(reporter, list);
   else reporter.dim("  (none)");

   const chosen = await chooseBackup(ctx, list, opts);
   if (opts.withDatabase && !chosen.databaseDump) {
      throw OpsError.restoreFailed(`${chosen.name} has no database dump beside it`);
   }

   reporter.banner("Rollback", [
      `Backup:   ${chosen.name}`,
      `Web root: ${cfg.webRoot}`,
      `Database: ${opts.withDatabase ? cfg.mysql.database : "left as is"}`,
   ]);
   await confirmOrAbort(prompter, `Replace ${cfg.webRoot} with ${chosen.name}?`, cfg.confirm, ctx.yes);

   const rootPassword = opts.withDatabase
      ? env.PANELOPS_MYSQL_ROOT_PASSWORD ?? (prompter.interactive ? await prompter.secret(`MySQL ${cfg.mysql.rootUser} password`) : "")
      : "";

   const state: { safety?: string } = {};
   const artisan = new Artisan(runner, cfg.webRoot, cfg.webUser);

   const result = await runProcedure({
      title: "Rollback",
      steps: [
         {
            title: "Safety backup of current site",
            critical: true,
            run: async () => {
               if (opts.safetyBackup === false) return "skipped";
               if (!isDirSync(cfg.webRoot) || !(await fs.promises.readdir(cfg.webRoot)).length) return "skipped";
               const prefix = safetyPrefix(cfg.backup.prefix);
               if (ctx.dryRun) {
                  reporter.dim(`[dry-run] would archive ${cfg.webRoot} as ${prefix}`);
                  return "skipped";
               }
               state.safety = await createBackup(cfg.webRoot, cfg.backup.dir, prefix);
               const pruned = await pruneBackups(cfg.backup.dir, prefix, cfg.backup.retain);
               if (pruned.length) reporter.dim(`   pruned ${pruned.length} old safety backup(s)`);
               return path.basename(state.safety);
            },
         },
         {
            title: "Restore files",
            critical: true,
            run: async () => {
               await act(ctx, `empty ${cfg.webRoot} and extract ${chosen.name}`, () => restoreBackup(chosen.path, cfg.webRoot, { clean: true }));
               return chosen.name;
            },
         },
         {
            title: "Restore database",
            run: async () => {
               if (!opts.withDatabase || !chosen.databaseDump) return "skipped";
               const client = new MysqlClient(runner, { host: cfg.mysql.host, user: cfg.mysql.rootUser, password: rootPassword || undefined });
               await client.importFile(cfg.mysql.database, chosen.databaseDump);
               return path.basename(chosen.databaseDump);
            },
         },
         {
            title: "Permissions and ownership",
            run: async () => {
               await applyPermissions(runner, cfg.webRoot, { user: cfg.webUser, group: cfg.webGroup }, WRITABLE_DIRS, { dryRun: ctx.dryRun });
               return `${cfg.webUser}:${cfg.webGroup}`;
            },
         },
         {
            title: "Clear caches",
            run: async () => {
               const problems = await artisan.clearCaches();
               for (const p of problems) reporter.warn(p);
               return problems.length ? `${problems.length} warning(s)` : undefined;
            },
         },
         {
            title: "Restart services",
            run: async () => {
               const fpm = await detectFpm(ctx);
               const services = new Services(runner);
               await services.restart(fpm.service);
               for (const s of cfg.services) await services.restart(s);
               return `nginx ${await new Nginx(runner, cfg.nginx).reload()}`;
            },
         },
         {
            title: "Probe site",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const r = await ctx.net.probe("http://localhost", { timeoutMs: cfg.http.timeoutMs });
               if (classify(r.status) !== "ok") throw new Error(`http://localhost answered ${statusCode(r.status)}${r.error ? ` (${r.error})` : ""}`);
               return `http://localhost ${statusCode(r.status)}`;
            },
         },
      ],
   }, undefined, { reporter, policy: cfg.errorPolicy, perf: ctx.perf });

   if (state.safety) reporter.info(`Pre-rollback state saved as ${state.safety}`);
   return { ok: result.ok, restored: chosen.path, safetyBackup: state.safety, result };
}
