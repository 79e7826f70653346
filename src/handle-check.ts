import path from "node:path";
import pc from "picocolors";
import { ownerOf, type OpsContext } from "./context.js";
import { MIN_FREE_DISK_GB, CERT_WARN_DAYS } from "./defaults.js";
import { capture } from "./exec.js";
import { checkPhp, checkService, checkTool, checkWritableDirs, reportSystem } from "./inspect.js";
import { MysqlClient } from "./mysql.js";
import { tallySince, type Tally } from "./reporter.js";
import { Services } from "./services.js";
import { certificateCandidates, certificateFromFile, daysUntil } from "./tls.js";
import { isDirSync, isFileSync, pathExistsSync } from "./utils.js";

export type CheckReport = { ready: boolean; tally: Tally };

export const SOURCE_REQUIRED = ["composer.json", "package.json", "artisan", ".env.example"];
export const LEFTOVER_MARKERS = ["wp-config.php", "index.html", "default.html"];

export type CheckOptions = {
   /** Ask for the MySQL root password to test the connection (default: when interactive) */
   askMysqlPassword?: boolean;
   now?: Date;
};

/**
 * Read-only readiness report for a deploy. Ready means no check failed;
 * warnings are listed but do not block.
 */
export async function handleCheck(ctx: OpsContext, opts: CheckOptions = {}): Promise<CheckReport> {
   const { cfg, reporter, runner } = ctx;
   const start = reporter.tally();

   reporter.banner("Pre-deployment readiness check", [
      `Domain:   ${cfg.domain}`,
      `Web root: ${cfg.webRoot}`,
      `Source:   ${cfg.sourceDir}`,
   ]);

   reporter.section("System");
   const freeGb = await reportSystem(ctx);

   reporter.section("PHP");
   await checkPhp(ctx);

   reporter.section("Build tools");
   await checkTool(ctx, "Composer", "composer", ["--version", "--no-ansi"]);
   await checkTool(ctx, "Node.js", "node", ["--version"]);
   await checkTool(ctx, "npm", "npm", ["--version"]);

   reporter.section("Database");
   if (await checkTool(ctx, "MySQL client", "mysql", ["--version"])) {
      const svc = await new Services(runner).firstActive(["mysql", "mariadb", "mysqld"]);
      if (svc) reporter.pass("MySQL server running", svc);
      else reporter.warnCheck("MySQL server running", "no mysql/mariadb unit is active");

      const ask = opts.askMysqlPassword ?? ctx.prompter.interactive;
      const password = ask ? await ctx.prompter.secret(`MySQL ${cfg.mysql.rootUser} password (Enter to skip)`) : "";
      if (ask && !password) {
         reporter.note("MySQL root connection", "skipped");
      } else {
         const client = new MysqlClient(runner, { host: cfg.mysql.host, user: cfg.mysql.rootUser, password: password || undefined });
         if (await client.ping()) reporter.pass("MySQL root connection");
         else if (password) reporter.fail("MySQL root connection", `cannot connect as ${cfg.mysql.rootUser}@${cfg.mysql.host}`);
         else reporter.warnCheck("MySQL root connection", "socket authentication refused; a password will be needed");
      }
   }

   reporter.section("Web server");
   if (await checkTool(ctx, "Nginx", "nginx", ["-v"])) {
      await checkService(ctx, "nginx", "Nginx", { inactive: "warn", disabled: "warn" });
   }
   const redis = await new Services(runner).firstActive(["redis-server", "redis"]);
   if (redis) reporter.pass("Redis running", redis);
   else reporter.warnCheck("Redis", "not running (optional; needed for redis cache/queue drivers)");

   reporter.section("SSL");
   await checkCertificateFile(ctx, opts.now ?? new Date());

   reporter.section("Firewall");
   await checkFirewall(ctx);

   reporter.section("Disk");
   if (freeGb === null) reporter.warnCheck("Free disk space", "could not determine");
   else if (freeGb > MIN_FREE_DISK_GB) reporter.pass("Free disk space", `${freeGb} GB`);
   else reporter.warnCheck("Free disk space", `${freeGb} GB (recommended > ${MIN_FREE_DISK_GB} GB)`);

   reporter.section("Web root");
   if (!isDirSync(cfg.webRoot)) {
      reporter.warnCheck("Web root exists", `${cfg.webRoot} will be created`);
   } else {
      reporter.pass("Web root exists", cfg.webRoot);
      const owner = await ownerOf(runner, cfg.webRoot);
      const want = `${cfg.webUser}:${cfg.webGroup}`;
      if (owner === want) reporter.pass("Web root owner", owner);
      else reporter.warnCheck("Web root owner", `${owner || "unknown"} (expected ${want})`);
      await checkWritableDirs(ctx, ["."], "warn");

      const leftovers = LEFTOVER_MARKERS.filter((f) => pathExistsSync(path.join(cfg.webRoot, f)));
      if (leftovers.length) reporter.warnCheck("Existing site files", `${leftovers.join(", ")} will be removed by deploy`);
      else reporter.pass("No leftover site files");
   }

   reporter.section("Release source");
   if (!isDirSync(cfg.sourceDir)) {
      reporter.fail("Source directory", `${cfg.sourceDir} not found`);
   } else {
      reporter.pass("Source directory", cfg.sourceDir);
      for (const f of SOURCE_REQUIRED) {
         if (isFileSync(path.join(cfg.sourceDir, f))) reporter.pass(`Source ${f}`);
         else reporter.fail(`Source ${f}`, "missing");
      }
   }

   const tally = tallySince(start, reporter.tally());
   const ready = tally.fail === 0;
   reporter.section("Readiness");
   reporter.plain(`Passed: ${pc.green(String(tally.pass))}  Warnings: ${pc.yellow(String(tally.warn))}  Failed: ${pc.red(String(tally.fail))}`);
   if (ready) reporter.log("Server is ready for deployment");
   else reporter.error("Fix the failed checks before deploying");
   return { ready, tally };
}

async function checkCertificateFile(ctx: OpsContext, now: Date): Promise<void> {
   const file = certificateCandidates(ctx.cfg.domain).find(isFileSync);
   if (!file) {
      ctx.reporter.warnCheck("SSL certificate", `none found for ${ctx.cfg.domain} (the panel may manage it)`);
      return;
   }
   try {
      const cert = await certificateFromFile(file);
      const days = daysUntil(cert.validTo, now);
      if (days < 0) ctx.reporter.warnCheck("SSL certificate", `${file} expired ${-days} day(s) ago`);
      else if (days < CERT_WARN_DAYS) ctx.reporter.warnCheck("SSL certificate", `${file} expires in ${days} day(s)`);
      else ctx.reporter.pass("SSL certificate", `${file}, ${days} day(s) left`);
   } catch (e) {
      ctx.reporter.warnCheck("SSL certificate", `${file} could not be read: ${e instanceof Error ? e.message : String(e)}`);
   }
}

export const FIREWALL_PORTS = ["22", "80", "443"];

/** Ports from `ufw status` that no ALLOW rule covers */
export function ufwMissingPorts(status: string, ports: string[] = FIREWALL_PORTS): string[] {
   const allowed = status.split(/\r?\n/)
      .filter((l) => /\sALLOW\b/.test(l))
      .map((l) => (l.split(/\s+ALLOW\b/)[0] ?? "").replace(/\s*\(v6\)$/, "").trim());
   return ports.filter((p) => !allowed.some((a) => coversPort(a, p)));
}

function coversPort(rule: string, port: string): boolean {
   if (rule === port || rule.startsWith(`${port}/`)) return true;
   // ufw application profiles
   if (port === "22") return /^OpenSSH$/i.test(rule);
   if (port === "80") return /^Nginx (Full|HTTP)$/i.test(rule);
   if (port === "443") return /^Nginx (Full|HTTPS)$/i.test(rule);
   return false;
}

async function checkFirewall(ctx: OpsContext): Promise<void> {
   if ((await ctx.runner.which("ufw")) === null) {
      ctx.reporter.note("UFW", "not installed");
      return;
   }
   const status = await capture(ctx.runner, "ufw", ["status"]);
   if (!status) {
      ctx.reporter.warnCheck("UFW", "status unavailable");
      return;
   }
   if (!/Status:\s*active/i.test(status)) {
      ctx.reporter.warnCheck("UFW", "inactive");
      return;
   }
   const missing = ufwMissingPorts(status);
   if (missing.length) ctx.reporter.warnCheck("UFW ports", `not allowed: ${missing.join(", ")}`);
   else ctx.reporter.pass("UFW ports", FIREWALL_PORTS.join(", "));
}
