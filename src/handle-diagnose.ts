import fs from "node:fs";
import path from "node:path";
import { detectFpm, ownerOf, tailFile, type OpsContext } from "./context.js";
import { WRITABLE_DIRS } from "./defaults.js";
import { EnvFile } from "./env-file.js";
import { succeeds } from "./exec.js";
import { burst, classify, joinUrl, probeMatrix, statusCode, type BurstSummary } from "./http-probe.js";
import { checkPhp, checkService, checkWritableDirs, reportSystem } from "./inspect.js";
import { LogWatcher, isSevere, missingEssentials, severeLogEntries, type LogEntry } from "./laravel.js";
import { majorMinor } from "./php.js";
import { Services } from "./services.js";
import { detectFastPanel } from "./system-info.js";
import type { CheckStatus } from "./types.js";
import { humanSize, isFileSync } from "./utils.js";

export type DiagnoseReport = {
   burst: BurstSummary;
   /** Severe entries Laravel wrote while the burst ran */
   newErrors: LogEntry[];
};

const RECENT = 20;
const STATUS_LINES = 12;

/** Read-only sweep of the host and the site; the whole report lands in the run log. */
export async function handleDiagnose(ctx: OpsContext): Promise<DiagnoseReport> {
   const { cfg, reporter, runner } = ctx;
   const root = cfg.webRoot;

   reporter.banner("Diagnostics", [`Domain:   ${cfg.domain}`, `Web root: ${root}`]);

   reporter.section("System");
   await reportSystem(ctx);

   reporter.section("Panel");
   const marker = detectFastPanel();
   if (marker) {
      reporter.note("FastPanel", marker);
      const unit = await new Services(runner).firstActive(["fastpanel2", "fastpanel"]);
      if (unit) reporter.pass("Panel service", unit);
      else reporter.warnCheck("Panel service", "fastpanel2/fastpanel not active");
   } else {
      reporter.note("FastPanel", "not detected");
   }
   if (await succeeds(runner, "id", [cfg.webUser])) reporter.pass("Web user", cfg.webUser);
   else reporter.fail("Web user", `${cfg.webUser} does not exist`);

   reporter.section("Services");
   await unitWithStatus(ctx, "nginx", "Nginx", "fail");
   const fpm = await detectFpm(ctx);
   await unitWithStatus(ctx, fpm.service, "PHP-FPM", "fail");
   const db = await new Services(runner).firstActive(["mysql", "mariadb", "mysqld"]);
   if (db) reporter.pass("Database server", db);
   else reporter.warnCheck("Database server", "no mysql/mariadb unit is active");
   for (const s of cfg.services) await unitWithStatus(ctx, s, s, "warn");

   reporter.section("PHP");
   await checkPhp(ctx);

   reporter.section("Laravel");
   const missing = missingEssentials(root);
   if (missing.length) reporter.fail("Essential files", `missing ${missing.join(", ")}`);
   else reporter.pass("Essential files");
   const envPath = path.join(root, ".env");
   if (isFileSync(envPath)) {
      const env = await EnvFile.load(envPath);
      if (env.get("APP_KEY")) reporter.pass("APP_KEY", "set");
      else reporter.fail("APP_KEY", "empty");
      reporter.note("APP_DEBUG", env.get("APP_DEBUG") ?? "unset");
      reporter.note("APP_ENV", env.get("APP_ENV") ?? "unset");
   } else {
      reporter.fail(".env", "missing");
   }
   if (isFileSync(path.join(root, "vendor/autoload.php"))) reporter.pass("vendor/autoload.php");
   else reporter.fail("vendor/autoload.php", "missing (composer install)");

   reporter.section("Permissions");
   reporter.note("Web root owner", (await ownerOf(runner, root)) || "unknown");
   await checkWritableDirs(ctx, WRITABLE_DIRS, "fail");

   reporter.section("HTTP");
   const matrix = await probeMatrix(cfg.http.baseUrls, cfg.http.pages, { timeoutMs: cfg.http.timeoutMs }, ctx.net.probe);
   for (const r of matrix) {
      const line = `${statusCode(r.status)}  ${r.timeMs} ms  ${humanSize(r.size)}`;
      const c = classify(r.status);
      reporter.check({ name: r.url, status: c === "ok" ? "pass" : c === "unreachable" ? "fail" : "warn", detail: r.error ? `${line} ${r.error}` : line });
      if (c === "server-error" && r.bodyPreview) reporter.attach(`response body ${r.url}`, r.bodyPreview);
   }

   reporter.section("Load burst");
   const watcher = new LogWatcher(path.join(root, "storage/logs/laravel.log"));
   await watcher.start();
   const urls = cfg.http.baseUrls.flatMap((b) => (cfg.http.pages.length ? cfg.http.pages : [""]).map((p) => joinUrl(b, p)));
   const summary = await burst(urls, cfg.http.burst.rounds, cfg.http.burst.concurrency, { timeoutMs: cfg.http.timeoutMs }, ctx.net.probe);
   const spread = Object.entries(summary.byStatus).sort().map(([k, v]) => `${k}×${v}`).join(" ");
   reporter.note("Requests", `${summary.total} (${spread})`);
   if (summary.serverErrors) reporter.warnCheck("Server errors under load", String(summary.serverErrors));
   else reporter.pass("No server errors under load");

   const newErrors = (await watcher.collect()).filter((e) => isSevere(e.level));
   if (newErrors.length) {
      reporter.warnCheck("Laravel errors during burst", String(newErrors.length));
      for (const e of newErrors.slice(-RECENT)) reporter.dim(`  [${e.time}] ${e.level}: ${e.message}`);
   } else {
      reporter.pass("No Laravel errors during burst");
   }

   reporter.section(`Last ${RECENT} severe log entries`);
   const severe = (await severeLogEntries(root)).flatMap((f) => f.entries.map((e) => ({ ...e, file: f.file })));
   if (!severe.length) reporter.dim("  (none)");
   for (const e of severe.slice(-RECENT)) {
      reporter.plain(`  ${e.file} [${e.time}] ${e.level}: ${e.message}`);
      if (e.context) reporter.attach(`${e.file} ${e.time}`, e.context);
   }

   await showTail(ctx, "Nginx error log", cfg.nginx.errorLog);
   const fpmLog = fpm.version ? `/var/log/php${majorMinor(fpm.version)}-fpm.log` : "/var/log/php-fpm.log";
   await showTail(ctx, "PHP-FPM log", fpmLog);

   reporter.section("Done");
   if (reporter.logFile) reporter.info(`Full report: ${reporter.logFile}`);
   return { burst: summary, newErrors };
}

/** A stopped unit gets the head of `systemctl status` printed under its check. */
async function unitWithStatus(ctx: OpsContext, name: string, label: string, inactive: CheckStatus) {
   if (await checkService(ctx, name, label, { inactive })) return;
   const status = await new Services(ctx.runner).status(name);
   for (const l of status.split(/\r?\n/).filter(Boolean).slice(0, STATUS_LINES)) ctx.reporter.dim(`    ${l}`);
}

async function showTail(ctx: OpsContext, title: string, file: string) {
   ctx.reporter.section(`${title} (${file})`);
   if (!fs.existsSync(file)) {
      ctx.reporter.dim("  not found");
      return;
   }
   const lines = await tailFile(file, RECENT);
   if (!lines.length) ctx.reporter.dim("  empty or unreadable");
   for (const l of lines) ctx.reporter.dim(`  ${l}`);
}
