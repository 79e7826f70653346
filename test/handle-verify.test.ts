import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { schedulerLine } from "../src/cron.js";
import { handleVerify } from "../src/handle-verify.js";
import type { CertInfo } from "../src/tls.js";
import { FakeRunner, fakeNet, makeContext, tmpDir, writeFiles } from "./helpers.js";

const NOW = new Date("2026-06-01T00:00:00Z");
const HEADERS = { "x-frame-options": "SAMEORIGIN", "x-content-type-options": "nosniff", "x-xss-protection": "1; mode=block" };

function cert(validTo: string): CertInfo {
   return { subject: "CN=example.test", issuer: "CN=Test CA", validFrom: new Date("2026-01-01T00:00:00Z"), validTo: new Date(validTo), altNames: ["example.test"] };
}

async function deployedSite(env = "APP_ENV=production\nAPP_DEBUG=false\nAPP_KEY=base64:dGVzdA==\n") {
   const root = path.join(await tmpDir(), "site");
   await writeFiles(root, {
      "artisan": "",
      ".env": env,
      "bootstrap/cache/config.php": "",
      "bootstrap/cache/routes-v7.php": "",
      "storage/app/public/.gitignore": "",
      "storage/logs/laravel.log": "[2026-05-31 12:00:00] production.INFO: booted\n",
      "vendor/autoload.php": "",
      "vendor/composer/autoload_classmap.php": "",
   });
   await fs.promises.mkdir(path.join(root, "public"));
   await fs.promises.symlink(path.join(root, "storage/app/public"), path.join(root, "public/storage"));
   return root;
}

function siteRunner(root: string) {
   return new FakeRunner()
      .on("php -r", { stdout: "8.3.6" })
      .on("php artisan --version", { stdout: "Laravel Framework 11.9.2\n" })
      .on("php artisan migrate:status", { stdout: "  2014_10_12_000000_create_users_table ........ [1] Ran\n" })
      .on("stat -c %U:%G", { stdout: "www-data:www-data\n" })
      .on("crontab -l -u www-data", { stdout: `${schedulerLine(root)}\n` });
}

describe("handleVerify", () => {
   it("passes a healthy deployment without warnings", async () => {
      const root = await deployedSite();
      const net = fakeNet({
         "http://example.test": { status: 200, headers: HEADERS },
         "https://example.test": 200,
         "http://localhost": 200,
      }, cert("2026-12-01T00:00:00Z"));
      const ctx = makeContext({ raw: { webRoot: root }, runner: siteRunner(root), net });
      const report = await handleVerify(ctx, { now: NOW });
      expect(report).toEqual({ ok: true, tally: { pass: report.tally.pass, warn: 0, fail: 0, info: 0 } });
      expect(ctx.output).toContain("✓ artisan --version: Laravel Framework 11.9.2");
      expect(ctx.output).toContain("✓ Migrations: 1 ran");
      expect(ctx.output).toContain("✓ Certificate: 183 day(s) left, issuer CN=Test CA");
      expect(ctx.output).toContain("✓ x-frame-options");
      expect(net.probed).toEqual(["http://example.test", "https://example.test", "http://localhost"]);
   });

   it("fails on an unreachable site and a broken install", async () => {
      const root = await deployedSite("APP_ENV=local\nAPP_DEBUG=true\nAPP_KEY=\n");
      await fs.promises.rm(path.join(root, "vendor"), { recursive: true });
      const net = fakeNet({ "http://example.test": 500, "https://example.test": 500 }, cert("2026-06-11T00:00:00Z"));
      const ctx = makeContext({ raw: { webRoot: root }, runner: siteRunner(root), net });
      const report = await handleVerify(ctx, { now: NOW });
      expect(report.ok).toBe(false);
      expect(report.tally.fail).toBe(4);
      expect(ctx.output).toContain("✗ HTTP on domain: http://example.test → 500 (5 ms)");
      expect(ctx.output).toContain("⚠ HTTPS on domain: https://example.test → 500 (5 ms)");
      expect(ctx.output).toContain("✗ HTTP on localhost: http://localhost → 000 (5 ms) ECONNREFUSED");
      expect(ctx.output).toContain("⚠ APP_ENV: local (expected production)");
      expect(ctx.output).toContain("⚠ APP_DEBUG: true (should be false in production)");
      expect(ctx.output).toContain("✗ APP_KEY: empty");
      expect(ctx.output).toContain("✗ vendor/: missing (composer install)");
      expect(ctx.output).toContain("⚠ Certificate: expires in 10 day(s) (CN=example.test)");
      expect(ctx.output).toContain("⚠ x-frame-options: missing");
   });

   it("counts severe log entries and a missing scheduler", async () => {
      const root = await deployedSite();
      await writeFiles(root, { "storage/logs/laravel.log": "[2026-05-31 12:00:00] production.ERROR: boom\n[2026-05-31 12:00:01] production.ERROR: again\n" });
      const runner = siteRunner(root).on("crontab -l -u www-data", { code: 1, stderr: "no crontab for www-data" });
      const ctx = makeContext({ raw: { webRoot: root }, runner, net: fakeNet({ "http://example.test": 200, "http://localhost": 200 }) });
      const report = await handleVerify(ctx, { now: NOW });
      expect(report.ok).toBe(true);
      expect(ctx.output).toContain("⚠ Laravel log: 2 error entries in laravel.log");
      expect(ctx.output).toContain("⚠ Scheduler cron: missing for www-data");
      expect(ctx.output).toContain("⚠ Certificate: could not fetch: connect ECONNREFUSED example.test:443");
   });
});
