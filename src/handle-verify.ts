import fs from "node:fs";
import path from "node:path";
import pc from "picocolors";
import { detectFpm, ownerOf, type OpsContext } from "./context.js";
import { hasSchedulerCron } from "./cron.js";
import { CERT_WARN_DAYS, WRITABLE_DIRS } from "./defaults.js";
import { EnvFile } from "./env-file.js";
import { SECURITY_HEADERS, classify, missingSecurityHeaders, statusCode, type ProbeResult } from "./http-probe.js";
import { checkService, checkWritableDirs } from "./inspect.js";
import { Artisan, cacheState, severeLogEntries, storageLink } from "./laravel.js";
import { tallySince, type Tally } from "./reporter.js";
import { daysUntil } from "./tls.js";
import type { CheckStatus } from "./types.js";
import { errorMessage, isDirSync, isFileSync } from "./utils.js";

export type VerifyReport = { ok: boolean; tally: Tally };

export type VerifyOptions = { now?: Date };

const ASSET_DIRS = ["public/build", "public/js", "public/css"];

/** Post-deploy health report. Passing means no check failed. */
export async function handleVerify(ctx: OpsContext, opts: VerifyOptions = {}): Promise<VerifyReport> {
   const { cfg, reporter, runner } = ctx;
   const root = cfg.webRoot;
   const artisan = new Artisan(runner, root, cfg.webUser);
   const start = reporter.tally();

   reporter.banner("Post-deployment verification", [`Domain:   ${cfg.domain}`, `Web root: ${root}`]);

   reporter.section("Services");
   await checkService(ctx, "nginx", "Nginx", { inactive: "fail" });
   const fpm = await detectFpm(ctx);
   await checkService(ctx, fpm.service, "PHP-FPM", { inactive: "fail" });
   for (const s of cfg.services) await checkService(ctx, s, s, { inactive: "warn" });

   reporter.section("HTTP");
   const probeOpts = { timeoutMs: cfg.http.timeoutMs };
   const domainRes = await ctx.net.probe(`http://${cfg.domain}`, probeOpts);
   reportProbe(ctx, "HTTP on domain", domainRes, "fail");
   const httpsRes = await ctx.net.probe(`https://${cfg.domain}`, probeOpts);
   reportProbe(ctx, "HTTPS on domain", httpsRes, "warn");
   reportProbe(ctx, "HTTP on localhost", await ctx.net.probe("http://localhost", probeOpts), "fail");

   reporter.section("Laravel");
   if (!isFileSync(path.join(root, "artisan"))) {
      reporter.fail("artisan", "missing");
   } else {
      const v = await artisan.version();
      if (v) reporter.pass("artisan --version", v);
      else reporter.fail("artisan --version", "does not run");
   }
   await checkEnv(ctx);

   const mig = await artisan.migrateStatus();
   if (!mig.ok) reporter.fail("migrate:status", mig.error);
   else if (mig.ran === 0) reporter.warnCheck("Migrations", "none ran");
   else reporter.pass("Migrations", `${mig.ran} ran${mig.pending ? `, ${mig.pending} pending` : ""}`);

   reporter.section("Permissions");
   const owner = await ownerOf(runner, root);
   const want = `${cfg.webUser}:${cfg.webGroup}`;
   if (owner === want) reporter.pass("Web root owner", owner);
   else reporter.warnCheck("Web root owner", `${owner || "unknown"} (expected ${want})`);
   await checkWritableDirs(ctx, WRITABLE_DIRS, "fail");

   reporter.section("Caches and storage");
   const cache = cacheState(root);
   if (cache.config) reporter.pass("Config cached");
   else reporter.warnCheck("Config cache", "not built (php artisan config:cache)");
   if (cache.routes) reporter.pass("Routes cached");
   else reporter.note("Route cache", "not built");
   const link = storageLink(root);
   if (link === "linked") reporter.pass("public/storage link");
   else reporter.warnCheck("public/storage link", `${link} (php artisan storage:link)`);

   reporter.section("Dependencies");
   if (!isDirSync(path.join(root, "vendor"))) reporter.fail("vendor/", "missing (composer install)");
   else if (!isFileSync(path.join(root, "vendor/autoload.php"))) reporter.fail("vendor/autoload.php", "missing");
   else reporter.pass("Composer dependencies");
   if (isFileSync(path.join(root, "vendor/composer/autoload_classmap.php"))) reporter.pass("Optimized autoloader");
   else reporter.warnCheck("Optimized autoloader", "composer install --optimize-autoloader");
   if (isFileSync(path.join(root, "package.json"))) {
      const built = ASSET_DIRS.filter((d) => isDirSync(path.join(root, d)));
      if (built.length) reporter.pass("Built assets", built.join(", "));
      else reporter.warnCheck("Built assets", "none found (npm run build)");
   }

   reporter.section("Logs");
   const severe = await severeLogEntries(root);
   const count = severe.reduce((n, f) => n + f.entries.length, 0);
   if (count) reporter.warnCheck("Laravel log", `${count} error entr${count === 1 ? "y" : "ies"} in ${severe.map((f) => path.basename(f.file)).join(", ")}`);
   else reporter.pass("Laravel log", "no errors");

   reporter.section("Scheduler");
   if (await hasSchedulerCron(runner, cfg.webUser)) reporter.pass("Scheduler cron");
   else reporter.warnCheck("Scheduler cron", `missing for ${cfg.webUser}`);

   reporter.section("TLS");
   try {
      const cert = await ctx.net.remoteCertificate(cfg.domain, 443, cfg.http.timeoutMs);
      const days = daysUntil(cert.validTo, opts.now ?? new Date());
      if (days < CERT_WARN_DAYS) reporter.warnCheck("Certificate", `expires in ${days} day(s) (${cert.subject})`);
      else reporter.pass("Certificate", `${days} day(s) left, issuer ${cert.issuer}`);
   } catch (e) {
      reporter.warnCheck("Certificate", `could not fetch: ${errorMessage(e)}`);
   }

   reporter.section("Security headers");
   const headerSource = [domainRes, httpsRes].find((r) => r.status > 0);
   if (!headerSource) {
      reporter.warnCheck("Security headers", "no response to inspect");
   } else {
      const missing = new Set(missingSecurityHeaders(headerSource.headers));
      for (const h of SECURITY_HEADERS) {
         if (missing.has(h)) reporter.warnCheck(h, "missing");
         else reporter.pass(h);
      }
   }

   const tally = tallySince(start, reporter.tally());
   reporter.section("Verification summary");
   reporter.plain(`Passed: ${pc.green(String(tally.pass))}  Warnings: ${pc.yellow(String(tally.warn))}  Failed: ${pc.red(String(tally.fail))}`);
   if (tally.fail === 0) reporter.log("Deployment verified");
   else reporter.error("Verification failed");
   return { ok: tally.fail === 0, tally };
}

function reportProbe(ctx: OpsContext, label: string, r: ProbeResult, failAs: CheckStatus) {
   const detail = `${r.url} → ${statusCode(r.status)} (${r.timeMs} ms)`;
   if (classify(r.status) === "ok") ctx.reporter.pass(label, detail);
   else ctx.reporter.check({ name: label, status: failAs, detail: r.error ? `${detail} ${r.error}` : detail });
}

async function checkEnv(ctx: OpsContext) {
   const envPath = path.join(ctx.cfg.webRoot, ".env");
   if (!fs.existsSync(envPath)) {
      ctx.reporter.fail(".env", "missing");
      return;
   }
   const env = await EnvFile.load(envPath);
   ctx.reporter.pass(".env present");
   const appEnv = env.get("APP_ENV");
   if (appEnv === "production") ctx.reporter.pass("APP_ENV", appEnv);
   else ctx.reporter.warnCheck("APP_ENV", `${appEnv ?? "unset"} (expected production)`);
   const debug = env.get("APP_DEBUG");
   if (debug === "false") ctx.reporter.pass("APP_DEBUG", "false");
   else ctx.reporter.warnCheck("APP_DEBUG", `${debug ?? "unset"} (should be false in production)`);
   if (!env.get("APP_KEY")) ctx.reporter.fail("APP_KEY", "empty");
}
