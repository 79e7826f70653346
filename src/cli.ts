#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import yargs, { type Argv } from "yargs";
import pc from "picocolors";
import { loadConfig, resolveConfig, writeConfigFromStub } from "./config.js";
import { liveNetwork, type OpsContext } from "./context.js";
import { OpsError } from "./errors.js";
import { DryRunRunner, SystemRunner, type CommandRunner } from "./exec.js";
import { handleBackupCreate, handleBackupList, handleBackupPrune } from "./handle-backup.js";
import { handleCheck } from "./handle-check.js";
import { handleDeploy, type DeployOptions } from "./handle-deploy.js";
import { handleDiagnose } from "./handle-diagnose.js";
import { handleFixLaravel } from "./handle-fix-laravel.js";
import { handleFixNginx } from "./handle-fix-nginx.js";
import { handlePipeline } from "./handle-pipeline.js";
import { handleRollback } from "./handle-rollback.js";
import { handleVerify } from "./handle-verify.js";
import { Perf } from "./perf.js";
import { TerminalPrompter } from "./prompt.js";
import { Reporter, runLogPath } from "./reporter.js";
import type { ErrorPolicy } from "./types.js";
import { errorMessage } from "./utils.js";

/* ------------------------------- shared options ------------------------------ */

type CommonArgs = {
   config?: string;
   domain?: string;
   "web-root"?: string;
   "web-user"?: string;
   "source-dir"?: string;
   "dry-run": boolean;
   yes: boolean;
   "error-policy"?: ErrorPolicy;
   "log-dir"?: string;
   "log-file": boolean;
};

function withCommon<T>(y: Argv<T>) {
   return y
      .option("config", { alias: "c", type: "string", desc: "Config file, or a stub name (no extension assumes .stub)" })
      .option("domain", { type: "string", desc: "Site domain (overrides config)" })
      .option("web-root", { type: "string", desc: "Laravel root on this host (overrides config)" })
      .option("web-user", { type: "string", desc: "Owner of the web root (overrides config)" })
      .option("source-dir", { type: "string", desc: "Release directory to deploy from" })
      .option("dry-run", { type: "boolean", default: false, desc: "Print changes instead of making them" })
      .option("yes", { alias: "y", type: "boolean", default: false, desc: "Answer yes to confirmations" })
      .option("error-policy", { type: "string", choices: ["abort", "continue"] as const, desc: "What a failed step does to the rest" })
      .option("log-dir", { type: "string", desc: "Directory for the run log" })
      .option("log-file", { type: "boolean", default: true, desc: "Tee output to a run log (--no-log-file to disable)" });
}

function withDeploy<T>(y: Argv<T>) {
   return y
      .option("seed", { type: "boolean", default: false, desc: "Run db:seed after migrating" })
      .option("skip-backup", { type: "boolean", default: false, desc: "Do not archive the current site first" })
      .option("hooks", { type: "boolean", default: true, desc: "Run pre/post hooks (--no-hooks to skip)" })
      .option("pre", { type: "array", string: true, desc: "Extra pre-hook command (repeatable)" })
      .option("post", { type: "array", string: true, desc: "Extra post-hook command (repeatable)" })
      .option("progress", { type: "boolean", default: true, desc: "Progress bar while copying" });
}

function deployOptions(args: { seed: boolean; "skip-backup": boolean; hooks: boolean; pre?: string[]; post?: string[]; progress: boolean }): DeployOptions {
   return {
      seed: args.seed,
      skipBackup: args["skip-backup"],
      noHooks: !args.hooks,
      pre: args.pre,
      post: args.post,
      progress: args.progress && Boolean(process.stdout.isTTY),
   };
}

async function buildContext(command: string, args: CommonArgs): Promise<OpsContext> {
   const loaded = await loadConfig(args.config);
   const cfg = resolveConfig(loaded.raw, {
      domain: args.domain,
      webRoot: args["web-root"],
      webUser: args["web-user"],
      sourceDir: args["source-dir"],
      logDir: args["log-dir"],
      errorPolicy: args["error-policy"],
   });
   const reporter = new Reporter({ logFile: args["log-file"] ? runLogPath(cfg.logDir, command) : undefined });
   const trace = (line: string) => reporter.dim(line);
   const system = new SystemRunner(trace);
   const runner: CommandRunner = args["dry-run"] ? new DryRunRunner(system, trace) : system;
   if (loaded.filepath) reporter.dim(`config: ${loaded.filepath}`);
   return {
      cfg,
      configPath: loaded.filepath,
      runner,
      reporter,
      prompter: new TerminalPrompter(),
      net: liveNetwork,
      perf: new Perf(undefined, trace),
      dryRun: args["dry-run"],
      yes: args.yes,
   };
}

/** Build the context, run, and turn the outcome into an exit code. */
async function run(command: string, args: CommonArgs, fn: (ctx: OpsContext) => Promise<boolean>): Promise<void> {
   let ctx: OpsContext | undefined;
   try {
      ctx = await buildContext(command, args);
      const ok = await fn(ctx);
      ctx.perf?.done();
      if (!ok) process.exitCode = 1;
   } catch (e) {
      const exitCode = e instanceof OpsError ? e.exitCode : 1;
      const reporter = ctx?.reporter;
      if (!reporter) console.error(pc.red(`❌ ${errorMessage(e)}`));
      else if (exitCode === 0) reporter.info(errorMessage(e));
      else reporter.error(errorMessage(e));
      if (reporter?.logFile) reporter.dim(`Log: ${reporter.logFile}`);
      process.exitCode = exitCode;
   }
}

process.on("SIGINT", () => {
   console.error(pc.red("\nAborted by user."));
   process.exit(130);
});

/* ----------------------------------- CLI ---------------------------------- */

await yargs(hideBin(process.argv))
   .scriptName("panelops")
   .usage("$0 <command> [options]")

   /* -------------------------------- check -------------------------------- */
   .command("check", "Pre-deployment readiness check", (y) => withCommon(y), (args) =>
      run("check", args, async (ctx) => (await handleCheck(ctx)).ready))

   /* -------------------------------- deploy ------------------------------- */
   .command("deploy", "Deploy the release in sourceDir to the web root", (y) => withDeploy(withCommon(y)), (args) =>
      run("deploy", args, async (ctx) => (await handleDeploy(ctx, deployOptions(args))).ok))

   /* -------------------------------- verify ------------------------------- */
   .command("verify", "Post-deployment verification", (y) => withCommon(y), (args) =>
      run("verify", args, async (ctx) => (await handleVerify(ctx)).ok))

   /* ------------------------------- rollback ------------------------------ */
   .command("rollback", "Restore the web root from a backup", (y) => withCommon(y)
      .option("backup", { alias: "b", type: "string", desc: "Archive name, stamp or path (default: newest)" })
      .option("pick", { type: "boolean", default: false, desc: "Choose the backup from a list" })
      .option("safety-backup", { type: "boolean", default: true, desc: "Archive the current site first (--no-safety-backup to skip)" })
      .option("with-database", { type: "boolean", default: false, desc: "Also import the database dump taken with the backup" }),
   (args) => run("rollback", args, async (ctx) => (await handleRollback(ctx, {
      backup: args.backup,
      pick: args.pick,
      safetyBackup: args["safety-backup"],
      withDatabase: args["with-database"],
   })).ok))

   /* -------------------------------- backup ------------------------------- */
   .command("backup", "Create, list and prune site backups", (y) => y
      .command("create", "Archive the web root now", (b) => withCommon(b)
         .option("with-database", { type: "boolean", default: false, desc: "Dump the site database alongside" }),
      (args) => run("backup-create", args, async (ctx) => {
         await handleBackupCreate(ctx, { withDatabase: args["with-database"] });
         return true;
      }))
      .command("ls", "List backups, newest first", (b) => withCommon(b), (args) =>
         run("backup-ls", { ...args, "log-file": false }, async (ctx) => {
            await handleBackupList(ctx);
            return true;
         }))
      .command("prune", "Delete all but the newest backups", (b) => withCommon(b)
         .option("retain", { type: "number", desc: "How many to keep (default: backup.retain)" }),
      (args) => run("backup-prune", args, async (ctx) => {
         await handleBackupPrune(ctx, args.retain);
         return true;
      }))
      .demandCommand(1, "Specify a backup subcommand.")
      .strict())

   /* --------------------------------- fix --------------------------------- */
   .command("fix", "Repair common breakages", (y) => y
      .command("nginx-binding", "Make nginx answer on localhost when the panel bound it to one IP", (f) => withCommon(f)
         .option("rewrite", { type: "boolean", default: false, desc: "Rewrite IP-bound listen directives in place" })
         .option("universal", { type: "boolean", default: false, desc: "Bind the fallback block to every address" }),
      (args) => run("fix-nginx-binding", args, async (ctx) => (await handleFixNginx(ctx, {
         rewrite: args.rewrite,
         universal: args.universal,
      })).ok))
      .command("laravel", "Repair the usual causes of an HTTP 500", (f) => withCommon(f)
         .option("reinstall", { type: "boolean", default: false, desc: "Run composer install even when vendor/ exists" }),
      (args) => run("fix-laravel", args, async (ctx) => (await handleFixLaravel(ctx, {
         reinstall: args.reinstall,
         policy: args["error-policy"],
      })).ok))
      .demandCommand(1, "Specify a fix subcommand.")
      .strict())

   /* ------------------------------- diagnose ------------------------------ */
   .command("diagnose", "Read-only diagnostics with a load burst and log analysis", (y) => withCommon(y), (args) =>
      run("diagnose", args, async (ctx) => {
         await handleDiagnose(ctx);
         return true;
      }))

   /* ------------------------------- pipeline ------------------------------ */
   .command("pipeline", "check, deploy and verify in one go", (y) => withDeploy(withCommon(y)), (args) =>
      run("pipeline", args, async (ctx) => (await handlePipeline(ctx, deployOptions(args))).ok))

   /* --------------------------------- init -------------------------------- */
   .command("init [stub]", "Write .panelops.yml from a stub", (y) => y
      .positional("stub", { type: "string", default: "fastpanel", describe: "Stub name: fastpanel or plain, or a path" })
      .option("out", { type: "string", default: ".panelops.yml", describe: "Destination file" })
      .option("force", { type: "boolean", default: false, describe: "Overwrite an existing file" }),
   (args) => {
      try {
         const { from, to } = writeConfigFromStub(args.stub, args.out, args.force);
         console.log(pc.green(`✔ Wrote ${to} from ${from}`));
      } catch (e) {
         console.error(pc.red(`❌ ${errorMessage(e)}`));
         process.exitCode = 1;
      }
   })

   .demandCommand(1)
   .help()
   .strict()
   .parse();
