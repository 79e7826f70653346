import fs from "node:fs";
import { assertRetain, createBackup, databaseDumpPath, listBackups, pruneBackups } from "./backup.js";
import { requireRoot, type OpsContext } from "./context.js";
import { printBackups } from "./handle-rollback.js";
import { MysqlClient } from "./mysql.js";
import { humanSize } from "./utils.js";

export type BackupCreateOptions = {
   /** Also dump the site database next to the archive */
   withDatabase?: boolean;
   env?: NodeJS.ProcessEnv;
};

export async function handleBackupCreate(ctx: OpsContext, opts: BackupCreateOptions = {}): Promise<string | null> {
   const { cfg, reporter } = ctx;
   requireRoot(ctx, "backup create");
   if (ctx.dryRun) {
      reporter.dim(`[dry-run] would archive ${cfg.webRoot} into ${cfg.backup.dir}`);
      return null;
   }
   const file = await createBackup(cfg.webRoot, cfg.backup.dir, cfg.backup.prefix);
   reporter.log(`Files: ${file} (${humanSize((await fs.promises.stat(file)).size)})`);

   if (opts.withDatabase) {
      const env = opts.env ?? process.env;
      const password = env.PANELOPS_MYSQL_ROOT_PASSWORD
         ?? (ctx.prompter.interactive ? await ctx.prompter.secret(`MySQL ${cfg.mysql.rootUser} password (Enter for socket auth)`) : "");
      const dump = databaseDumpPath(file);
      await new MysqlClient(ctx.runner, { host: cfg.mysql.host, user: cfg.mysql.rootUser, password: password || undefined })
         .dump(cfg.mysql.database, dump);
      reporter.log(`Database: ${dump}`);
   }
   return file;
}

export async function handleBackupList(ctx: OpsContext): Promise<number> {
   const { cfg, reporter } = ctx;
   const list = await listBackups(cfg.backup.dir, cfg.backup.prefix);
   reporter.section(`Backups in ${cfg.backup.dir} (${cfg.backup.prefix})`);
   if (!list.length) reporter.dim("  (none)");
   else printBackups(reporter, list);
   return list.length;
}

/** Keep the newest `retain` (defaults to backup.retain) archives. */
export async function handleBackupPrune(ctx: OpsContext, retain?: number): Promise<string[]> {
   const { cfg, reporter } = ctx;
   requireRoot(ctx, "backup prune");
   const keep = retain ?? cfg.backup.retain;
   assertRetain(keep);
   if (ctx.dryRun) {
      const doomed = (await listBackups(cfg.backup.dir, cfg.backup.prefix)).slice(keep);
      for (const b of doomed) reporter.dim(`[dry-run] would remove ${b.path}`);
      return doomed.map((b) => b.path);
   }
   const removed = await pruneBackups(cfg.backup.dir, cfg.backup.prefix, keep);
   for (const r of removed) reporter.dim(`  - ${r}`);
   reporter.log(`Kept ${keep}, removed ${removed.length}`);
   return removed;
}
