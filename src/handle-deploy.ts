import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createBackup, databaseDumpPath, pruneBackups } from "./backup.js";
import { act, detectFpm, publicDir, requireCommands, requireRoot, type FpmInfo, type OpsContext } from "./context.js";
import { ensureSchedulerCron } from "./cron.js";
import { COMPOSER_TIMEOUT_MS, WRITABLE_DIRS } from "./defaults.js";
import { EnvFile, ensureEnvFile, generateAppKey } from "./env-file.js";
import { OpsError } from "./errors.js";
import { applyPermissions, cleanLeftovers, copyRelease, restorePreserved, stashPreserved } from "./fileset.js";
import { runHookPhase } from "./hook.js";
import { classify, statusCode } from "./http-probe.js";
import { checkWritableDirs } from "./inspect.js";
import { Artisan, ensureStructure, storageLink } from "./laravel.js";
import { MysqlClient, generatePassword, writeCredentials } from "./mysql.js";
import { Nginx, renderSiteConfig } from "./nginx.js";
import { Php, versionAtLeast } from "./php.js";
import { runProcedure, type Procedure, type ProcedureResult } from "./procedure.js";
import { confirmOrAbort } from "./prompt.js";
import { Services } from "./services.js";
import { isDirSync, isFileSync, isRecord } from "./utils.js";

export type DeployOptions = {
   seed?: boolean;
   skipBackup?: boolean;
   noHooks?: boolean;
   /** Extra hook commands from the command line */
   pre?: string[];
   post?: string[];
   progress?: boolean;
   /** Source of PANELOPS_MYSQL_ROOT_PASSWORD / PANELOPS_DB_PASSWORD for unattended runs */
   env?: NodeJS.ProcessEnv;
};

export type DeployResult = {
   ok: boolean;
   backup?: string;
   result: ProcedureResult;
};

type DeployState = {
   rootPassword?: string;
   dbPassword: string;
   backup?: string;
   stashDir: string;
   kept: string[];
   fpm: FpmInfo;
};

export async function handleDeploy(ctx: OpsContext, opts: DeployOptions = {}): Promise<DeployResult> {
   const { cfg, reporter, runner, prompter } = ctx;
   const env = opts.env ?? process.env;

   requireRoot(ctx, "deploy");
   await requireCommands(runner, ["php", "composer", "npm", "mysql", "nginx"]);
   const phpVersion = await new Php(runner).version();
   if (!phpVersion || !versionAtLeast(phpVersion, cfg.php.minVersion)) {
      throw OpsError.prerequisiteMissing(`PHP >= ${cfg.php.minVersion} (found ${phpVersion ?? "none"})`);
   }

   reporter.banner("Laravel deployment", [
      `Domain:   ${cfg.domain}`,
      `Source:   ${cfg.sourceDir}`,
      `Web root: ${cfg.webRoot}`,
      `Owner:    ${cfg.webUser}:${cfg.webGroup}`,
      `Policy:   ${cfg.errorPolicy}${ctx.dryRun ? " (dry run)" : ""}`,
   ]);
   await confirmOrAbort(prompter, `Deploy ${cfg.sourceDir} to ${cfg.webRoot}?`, cfg.confirm, ctx.yes);

   const rootPassword = env.PANELOPS_MYSQL_ROOT_PASSWORD
      ?? (prompter.interactive ? await prompter.secret(`MySQL ${cfg.mysql.rootUser} password (Enter for socket auth)`) : "");

   const dbPassword = await resolveDbPassword(ctx, env);
   let stashDir: string | undefined;
   try {
      stashDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "panelops-stash-"));
      const state: DeployState = {
         rootPassword: rootPassword || undefined,
         dbPassword,
         stashDir,
         kept: [],
         fpm: await detectFpm(ctx),
      };

      if (!opts.noHooks) {
         await runHookPhase(cfg.hooks, "pre", { webRoot: cfg.webRoot, domain: cfg.domain, configPath: ctx.configPath }, {
            runner, reporter, extra: opts.pre, asUser: cfg.webUser,
         });
      }

      const result = await runProcedure(deployProcedure(ctx, opts), state, { reporter, policy: cfg.errorPolicy, perf: ctx.perf });

      if (result.ok && !opts.noHooks) {
         await runHookPhase(cfg.hooks, "post", { webRoot: cfg.webRoot, domain: cfg.domain, configPath: ctx.configPath, backup: state.backup }, {
            runner, reporter, extra: opts.post, asUser: cfg.webUser,
         });
      }

      reporter.banner(result.ok ? "Deployment complete" : "Deployment finished with failures", [
         `Site:   https://${cfg.domain}`,
         `Backup: ${state.backup ?? "none"}`,
         ...(reporter.logFile ? [`Log:    ${reporter.logFile}`] : []),
      ]);
      return { ok: result.ok, backup: state.backup, result };
   } finally {
      if (stashDir) await fs.promises.rm(stashDir, { recursive: true, force: true });
   }
}

/**
 * Keep the password already in a preserved .env so re-deploys converge; otherwise
 * take it from the environment, ask, or generate one.
 */
async function resolveDbPassword(ctx: OpsContext, env: NodeJS.ProcessEnv): Promise<string> {
   const envPath = path.join(ctx.cfg.webRoot, ".env");
   if (isFileSync(envPath)) {
      const existing = (await EnvFile.load(envPath)).get("DB_PASSWORD");
      if (existing) return existing;
   }
   if (env.PANELOPS_DB_PASSWORD) return env.PANELOPS_DB_PASSWORD;
   if (ctx.prompter.interactive) {
      const given = await ctx.prompter.secret(`Password for database user ${ctx.cfg.mysql.user} (Enter to generate)`);
      if (given) return given;
   }
   return generatePassword();
}

function hasBuildScript(pkgFile: string): boolean {
   try {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgFile, "utf8"));
      return isRecord(pkg) && isRecord(pkg.scripts) && typeof pkg.scripts.build === "string";
   } catch {
      return false;
   }
}

function deployProcedure(ctx: OpsContext, opts: DeployOptions): Procedure<DeployState> {
   const { cfg, reporter, runner } = ctx;
   const root = cfg.webRoot;
   // Under --dry-run nothing is copied, so look at the release itself
   const appDir = ctx.dryRun ? cfg.sourceDir : root;
   const artisan = new Artisan(runner, root, cfg.webUser);
   const nginx = new Nginx(runner, cfg.nginx);
   const services = new Services(runner);
   const rootDb = (s: DeployState) => new MysqlClient(runner, { host: cfg.mysql.host, user: cfg.mysql.rootUser, password: s.rootPassword });

   return {
      title: "Deploy",
      steps: [
         {
            title: "Backup current site",
            // Later steps delete and overwrite the site; never run them without an archive
            critical: true,
            run: async (s) => {
               if (opts.skipBackup) return "skipped";
               if (!isDirSync(root) || !(await fs.promises.readdir(root)).length) return "skipped";
               if (ctx.dryRun) {
                  reporter.dim(`[dry-run] would archive ${root} into ${cfg.backup.dir}`);
                  return "skipped";
               }
               s.backup = await createBackup(root, cfg.backup.dir, cfg.backup.prefix);
               reporter.log(`Files: ${s.backup}`);
               if (s.rootPassword && (await rootDb(s).databaseExists(cfg.mysql.database))) {
                  const dump = databaseDumpPath(s.backup);
                  await rootDb(s).dump(cfg.mysql.database, dump);
                  reporter.log(`Database: ${dump}`);
               }
               const pruned = await pruneBackups(cfg.backup.dir, cfg.backup.prefix, cfg.backup.retain);
               if (pruned.length) reporter.dim(`   pruned ${pruned.length} old backup(s)`);
               return path.basename(s.backup);
            },
         },
         {
            title: "Stash preserved paths",
            critical: true,
            run: async (s) => {
               if (!isDirSync(root)) await act(ctx, `create ${root}`, () => fs.promises.mkdir(root, { recursive: true }).then(() => undefined));
               if (ctx.dryRun) return "skipped";
               s.kept = await stashPreserved(root, cfg.preserve, s.stashDir);
               return s.kept.length ? `kept ${s.kept.join(", ")}` : "nothing to keep";
            },
         },
         {
            title: "Clean leftovers",
            run: async () => {
               const removed = await cleanLeftovers(root, cfg.clean, { dryRun: ctx.dryRun });
               for (const r of removed) reporter.dim(`   - ${r}`);
               return `${removed.length} removed`;
            },
         },
         {
            title: "Copy release",
            critical: true,
            run: async () => {
               const r = await copyRelease(cfg.sourceDir, root, cfg.exclude, { progress: opts.progress, dryRun: ctx.dryRun });
               return `${r.copied} file(s), ${r.excluded} excluded`;
            },
         },
         {
            title: "Restore preserved paths",
            run: async (s) => {
               if (ctx.dryRun || !s.kept.length) return "skipped";
               await restorePreserved(s.stashDir, root, s.kept);
               return s.kept.join(", ");
            },
         },
         {
            title: "Ensure Laravel structure",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const created = await ensureStructure(root);
               return created.length ? `created ${created.join(", ")}` : "already present";
            },
         },
         {
            title: "Configure environment",
            run: async (s) => {
               if (ctx.dryRun) return "skipped";
               const envPath = path.join(root, ".env");
               const origin = await ensureEnvFile(root, { APP_NAME: "Laravel" });
               const env = await EnvFile.load(envPath);
               const changed = env.setMany({
                  APP_ENV: "production",
                  APP_DEBUG: "false",
                  APP_URL: `https://${cfg.domain}`,
                  DB_CONNECTION: "mysql",
                  DB_HOST: cfg.mysql.host,
                  DB_DATABASE: cfg.mysql.database,
                  DB_USERNAME: cfg.mysql.user,
                  DB_PASSWORD: s.dbPassword,
               });
               if (!env.get("APP_KEY")) {
                  env.set("APP_KEY", generateAppKey());
                  changed.push("APP_KEY");
               }
               if (changed.length) await env.save(envPath);
               const note = origin === "present" ? "" : ` (${origin})`;
               return changed.length ? `updated ${changed.join(", ")}${note}` : `unchanged${note}`;
            },
         },
         {
            title: "Install dependencies",
            run: async () => {
               // the owner must be able to write vendor/ and node_modules/
               await runner.run("chown", ["-R", `${cfg.webUser}:${cfg.webGroup}`, root]);
               const base = { cwd: root, asUser: cfg.webUser, timeoutMs: COMPOSER_TIMEOUT_MS };
               await runner.run("composer", ["install", "--no-dev", "--optimize-autoloader", "--no-interaction"], {
                  ...base, env: { COMPOSER_NO_INTERACTION: "1" },
               });
               const pkg = path.join(appDir, "package.json");
               if (!isFileSync(pkg)) return "composer";
               const lock = isFileSync(path.join(appDir, "package-lock.json"));
               await runner.run("npm", [lock ? "ci" : "install"], base);
               if (!hasBuildScript(pkg)) return `composer, npm ${lock ? "ci" : "install"}`;
               await runner.run("npm", ["run", "build"], base);
               return `composer, npm ${lock ? "ci" : "install"}, npm run build`;
            },
         },
         {
            title: "Provision database",
            run: async (s) => {
               const local = cfg.mysql.host === "localhost" || cfg.mysql.host === "127.0.0.1";
               await rootDb(s).provision({
                  database: cfg.mysql.database,
                  user: cfg.mysql.user,
                  password: s.dbPassword,
                  userHost: local ? "localhost" : "%",
               });
               if (!ctx.dryRun) {
                  const file = await writeCredentials(cfg.mysql.credentialsDir, {
                     host: cfg.mysql.host, database: cfg.mysql.database, user: cfg.mysql.user, password: s.dbPassword,
                  });
                  reporter.log(`Credentials saved to ${file}`);
               }
               await artisan.run(["migrate", "--force"]);
               if (opts.seed) await artisan.run(["db:seed", "--force"]);
               return `${cfg.mysql.database} / ${cfg.mysql.user}${opts.seed ? ", seeded" : ""}`;
            },
         },
         {
            title: "Configure web server",
            critical: true,
            run: async (s) => {
               if (cfg.nginx.manageSite) {
                  const content = renderSiteConfig({ domain: cfg.domain, publicDir: publicDir(cfg), fpmSocket: s.fpm.socket });
                  if (ctx.dryRun) reporter.dim(`[dry-run] would write ${nginx.sitePath(cfg.domain)} and enable it`);
                  else {
                     if (await nginx.installSite(cfg.domain, content)) reporter.log(`Site config written: ${nginx.sitePath(cfg.domain)}`);
                     if (await nginx.disableDefaultSite()) reporter.dim("   removed default site link");
                  }
               }
               const t = await nginx.test();
               if (!t.ok) throw OpsError.nginxInvalid(t.output);
               if (!cfg.nginx.manageSite) return "vhost managed by the panel; config test passed";
               return await nginx.reload();
            },
         },
         {
            title: "Set permissions",
            run: async () => {
               const r = await applyPermissions(runner, root, { user: cfg.webUser, group: cfg.webGroup }, WRITABLE_DIRS, { dryRun: ctx.dryRun });
               return `${r.dirs} dir(s), ${r.files} file(s), owner ${cfg.webUser}:${cfg.webGroup}`;
            },
         },
         {
            title: "Optimize Laravel",
            run: async () => {
               const problems = [...(await artisan.clearCaches()), ...(await artisan.buildCaches())];
               for (const p of problems) reporter.warn(p);
               if (ctx.dryRun || storageLink(root) !== "linked") {
                  const r = await artisan.run(["storage:link"], { allowFailure: true });
                  if (r.code !== 0) reporter.warn(`storage:link failed: ${r.stderr.trim() || r.stdout.trim()}`);
               }
               return problems.length ? `${problems.length} warning(s)` : "caches rebuilt";
            },
         },
         {
            title: "Scheduler cron",
            run: async () => ensureSchedulerCron(runner, cfg.webUser, root),
         },
         {
            title: "Restart services",
            run: async (s) => {
               await services.restart(s.fpm.service);
               for (const name of cfg.services) await services.restart(name);
               const how = await nginx.reload();
               return `${[s.fpm.service, ...cfg.services].join(", ")} restarted; nginx ${how}`;
            },
         },
         {
            title: "Final checks",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const before = reporter.tally().warn;
               const res = await ctx.net.probe("http://localhost", { timeoutMs: cfg.http.timeoutMs });
               if (classify(res.status) === "ok") reporter.pass("http://localhost", statusCode(res.status));
               else reporter.warnCheck("http://localhost", `${statusCode(res.status)}${res.error ? ` ${res.error}` : ""}`);
               await checkWritableDirs(ctx, WRITABLE_DIRS, "warn");
               const mig = await artisan.migrateStatus();
               if (mig.ok) reporter.pass("Migrations", `${mig.ran} ran, ${mig.pending} pending`);
               else reporter.warnCheck("Migrations", mig.error);
               const warned = reporter.tally().warn - before;
               return warned ? `${warned} warning(s)` : "all good";
            },
         },
      ],
   };
}

