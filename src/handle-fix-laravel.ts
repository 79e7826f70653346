import path from "node:path";
import { detectFpm, requireCommands, requireRoot, type OpsContext } from "./context.js";
import { COMPOSER_TIMEOUT_MS, WRITABLE_DIRS } from "./defaults.js";
import { EnvFile, ensureEnvFile, generateAppKey } from "./env-file.js";
import { OpsError } from "./errors.js";
import { applyPermissions } from "./fileset.js";
import { classify, statusCode } from "./http-probe.js";
import { Artisan, ensureStructure } from "./laravel.js";
import { Nginx } from "./nginx.js";
import { runProcedure, type ProcedureResult } from "./procedure.js";
import { confirmOrAbort } from "./prompt.js";
import { Services } from "./services.js";
import type { ErrorPolicy } from "./types.js";
import { isDirSync, isFileSync } from "./utils.js";

export type FixLaravelOptions = {
   /** Run composer install even when vendor/autoload.php exists */
   reinstall?: boolean;
   /** Overrides the repair default of carrying on past failed steps */
   policy?: ErrorPolicy;
};

/**
 * Repair the usual causes of an HTTP 500 from a freshly copied Laravel tree.
 * Each step is independent, so by default a failure does not stop the rest.
 */
export async function handleFixLaravel(ctx: OpsContext, opts: FixLaravelOptions = {}): Promise<ProcedureResult> {
   const { cfg, reporter, runner } = ctx;
   const root = cfg.webRoot;
   requireRoot(ctx, "fix laravel");
   await requireCommands(runner, ["php"]);
   if (!isDirSync(root)) throw OpsError.configInvalid(`Web root ${root} does not exist`);

   reporter.banner("Laravel repair", [`Web root: ${root}`, `Owner:    ${cfg.webUser}:${cfg.webGroup}`]);
   await confirmOrAbort(ctx.prompter, `Repair the Laravel install in ${root}?`, cfg.confirm, ctx.yes);

   const artisan = new Artisan(runner, root, cfg.webUser);
   const autoload = path.join(root, "vendor/autoload.php");

   return runProcedure({
      title: "Laravel repair",
      steps: [
         {
            title: "Laravel structure",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const created = await ensureStructure(root);
               return created.length ? `created ${created.join(", ")}` : "complete";
            },
         },
         {
            title: "Environment and APP_KEY",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const origin = await ensureEnvFile(root, { APP_NAME: "Laravel", APP_ENV: "production", APP_DEBUG: "false" });
               const envPath = path.join(root, ".env");
               if ((await EnvFile.load(envPath)).get("APP_KEY")) return `.env ${origin}, APP_KEY set`;
               const r = await artisan.run(["key:generate", "--force"], { allowFailure: true });
               if (r.code === 0) return `.env ${origin}, APP_KEY generated by artisan`;
               // artisan cannot boot without vendor/; write the key directly
               const env = await EnvFile.load(envPath);
               env.set("APP_KEY", generateAppKey());
               await env.save(envPath);
               return `.env ${origin}, APP_KEY written`;
            },
         },
         {
            title: "Permissions and ownership",
            run: async () => {
               const s = await applyPermissions(runner, root, { user: cfg.webUser, group: cfg.webGroup }, WRITABLE_DIRS, { dryRun: ctx.dryRun });
               return `${s.dirs} dir(s), ${s.files} file(s)`;
            },
         },
         {
            title: "Composer dependencies",
            run: async () => {
               if (isFileSync(autoload) && !opts.reinstall) return "skipped";
               await requireCommands(runner, ["composer"]);
               await runner.run("composer", ["install", "--no-dev", "--optimize-autoloader", "--no-interaction"], {
                  cwd: root, asUser: cfg.webUser, timeoutMs: COMPOSER_TIMEOUT_MS, env: { COMPOSER_NO_INTERACTION: "1" },
               });
               if (!ctx.dryRun && !isDirSync(path.join(root, "vendor/laravel/framework"))) {
                  throw new Error("vendor/laravel/framework is still missing after composer install");
               }
               return "installed";
            },
         },
         {
            title: "Caches",
            run: async () => {
               const problems = [...(await artisan.clearCaches()), ...(await artisan.buildCaches())];
               for (const p of problems) reporter.warn(p);
               return problems.length ? `${problems.length} warning(s)` : "cleared and rebuilt";
            },
         },
         {
            title: "Artisan boots",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const v = await artisan.version();
               if (!v) throw new Error("php artisan --version failed");
               return v;
            },
         },
         {
            title: "Restart services",
            run: async () => {
               const fpm = await detectFpm(ctx);
               await new Services(runner).restart(fpm.service);
               return `${fpm.service} restarted, nginx ${await new Nginx(runner, cfg.nginx).reload()}`;
            },
         },
         {
            title: "HTTP test",
            run: async () => {
               if (ctx.dryRun) return "skipped";
               const results: string[] = [];
               for (const url of ["http://localhost", `http://${cfg.domain}`]) {
                  const r = await ctx.net.probe(url, { timeoutMs: cfg.http.timeoutMs });
                  results.push(`${url} ${statusCode(r.status)}`);
                  if (classify(r.status) === "ok") reporter.log(`${url}: ${statusCode(r.status)}`);
                  else reporter.warn(`${url}: ${statusCode(r.status)}${r.error ? ` ${r.error}` : ""}`);
               }
               return results.join(", ");
            },
         },
      ],
   }, undefined, { reporter, policy: opts.policy ?? "continue", perf: ctx.perf });
}
