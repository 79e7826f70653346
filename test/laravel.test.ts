import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
   Artisan, LogWatcher, cacheState, ensureStructure, isSevere, missingEssentials, parseLaravelLog, parseMigrateStatus, severeLogEntries, storageLink,
} from "../src/laravel.js";
import { FakeRunner, tmpDir, writeFiles } from "./helpers.js";

const LOG = [
   "[2026-03-01 10:00:00] production.INFO: User logged in",
   "[2026-03-01 10:00:01] production.ERROR: SQLSTATE[HY000] [2002] Connection refused {\"exception\":\"[object] (PDOException)\"}",
   "[stacktrace]",
   "#0 /var/www/app/vendor/laravel/framework/src/Connection.php(70): PDO->__construct()",
   "",
   "[2026-03-01 10:00:02] local.critical: Out of memory",
   "",
].join("\n");

describe("parseLaravelLog", () => {
   it("splits entries and keeps continuation lines as context", () => {
      const entries = parseLaravelLog(LOG);
      expect(entries.map((e) => [e.time, e.env, e.level])).toEqual([
         ["2026-03-01 10:00:00", "production", "INFO"],
         ["2026-03-01 10:00:01", "production", "ERROR"],
         ["2026-03-01 10:00:02", "local", "CRITICAL"],
      ]);
      expect(entries[1]?.context).toBe("[stacktrace]\n#0 /var/www/app/vendor/laravel/framework/src/Connection.php(70): PDO->__construct()");
      expect(entries[2]?.message).toBe("Out of memory");
   });

   it("treats error and above as severe", () => {
      expect(["debug", "warning", "error", "EMERGENCY"].map(isSevere)).toEqual([false, false, true, true]);
   });

   it("collects severe entries per log file", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { "storage/logs/laravel.log": LOG, "storage/logs/worker.log": "[2026-03-01 09:00:00] production.INFO: ok\n" });
      const files = await severeLogEntries(dir);
      expect(files.map((f) => [f.file, f.entries.length])).toEqual([["laravel.log", 2], ["worker.log", 0]]);
   });
});

describe("LogWatcher", () => {
   it("returns only what was appended after start", async () => {
      const dir = await tmpDir();
      const file = path.join(dir, "laravel.log");
      await fs.promises.writeFile(file, "[2026-03-01 10:00:00] production.ERROR: before\n");
      const watcher = new LogWatcher(file);
      await watcher.start();
      await fs.promises.appendFile(file, "[2026-03-01 10:05:00] production.ERROR: during\n");
      expect((await watcher.collect()).map((e) => e.message)).toEqual(["during"]);
      expect(await watcher.collect()).toEqual([]);
   });

   it("reads a rotated file from the top", async () => {
      const dir = await tmpDir();
      const file = path.join(dir, "laravel.log");
      await fs.promises.writeFile(file, "[2026-03-01 10:00:00] production.ERROR: a long line that was rotated away\n");
      const watcher = new LogWatcher(file);
      await watcher.start();
      await fs.promises.writeFile(file, "[2026-03-02 00:00:01] production.ERROR: new\n");
      expect((await watcher.collect()).map((e) => e.message)).toEqual(["new"]);
   });

   it("handles a log that does not exist yet", async () => {
      const watcher = new LogWatcher(path.join(await tmpDir(), "laravel.log"));
      await watcher.start();
      expect(await watcher.collect()).toEqual([]);
   });
});

describe("parseMigrateStatus", () => {
   it("reads the dotted layout", () => {
      const out = [
         "  Migration name .............................. Batch / Status  ",
         "  2014_10_12_000000_create_users_table ................. [1] Ran  ",
         "  2019_08_19_000000_create_failed_jobs_table ........... [1] Ran  ",
         "  2026_01_01_000000_create_orders_table ................ Pending  ",
      ].join("\n");
      expect(parseMigrateStatus(out)).toEqual({ ran: 2, pending: 1 });
   });

   it("reads the table layout", () => {
      const out = [
         "+------+------------------------------------------------+-------+",
         "| Ran? | Migration                                      | Batch |",
         "+------+------------------------------------------------+-------+",
         "| Yes  | 2014_10_12_000000_create_users_table           | 1     |",
         "| No   | 2026_01_01_000000_create_orders_table          |       |",
         "+------+------------------------------------------------+-------+",
      ].join("\n");
      expect(parseMigrateStatus(out)).toEqual({ ran: 1, pending: 1 });
   });
});

describe("site layout", () => {
   it("creates the writable tree once", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { "storage/logs/.gitignore": "*" });
      expect(await ensureStructure(dir)).toEqual([
         "storage/app/public",
         "storage/framework/cache/data",
         "storage/framework/sessions",
         "storage/framework/views",
         "bootstrap/cache",
      ]);
      expect(await ensureStructure(dir)).toEqual([]);
   });

   it("lists missing essentials", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { "composer.json": "{}", "artisan": "", "app/Models/User.php": "" });
      expect(missingEssentials(dir)).toEqual([
         ".env.example", "public/index.php", "bootstrap/app.php", "config/app.php",
         "config/", "database/", "public/", "resources/", "routes/", "storage/", "bootstrap/",
      ]);
   });

   it("reports cache files and the storage link", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { "bootstrap/cache/config.php": "", "storage/app/public/.gitignore": "", "public/index.php": "" });
      expect(cacheState(dir)).toEqual({ config: true, routes: false, packages: false });
      expect(storageLink(dir)).toBe("missing");
      await fs.promises.symlink(path.join(dir, "storage/app/public"), path.join(dir, "public/storage"));
      expect(storageLink(dir)).toBe("linked");
      await fs.promises.rm(path.join(dir, "storage/app/public"), { recursive: true });
      expect(storageLink(dir)).toBe("broken");
   });
});

describe("Artisan", () => {
   it("runs as the site owner in the web root", async () => {
      const runner = new FakeRunner().on("php artisan --version", { stdout: "Laravel Framework 11.9.2\n" });
      const artisan = new Artisan(runner, "/var/www/app", "www-data");
      expect(await artisan.version()).toBe("Laravel Framework 11.9.2");
      expect(runner.calls[0]?.opts).toMatchObject({ cwd: "/var/www/app", asUser: "www-data", readOnly: true });
   });

   it("collects the first line of each failed command", async () => {
      const runner = new FakeRunner().on("php artisan route:cache", { code: 1, stderr: "Unable to prepare route [api/user] for serialization.\nUse Closure" });
      const failures = await new Artisan(runner, "/var/www/app").buildCaches();
      expect(failures).toEqual(["route:cache: Unable to prepare route [api/user] for serialization."]);
      expect(runner.lines()).toEqual(["php artisan config:cache", "php artisan route:cache", "php artisan view:cache"]);
   });

   it("falls back to the exit code when a failed command printed nothing", async () => {
      const runner = new FakeRunner()
         .on("php artisan view:cache", { code: 255 })
         .on("php artisan migrate:status", { code: 1, stdout: "\n" });
      const artisan = new Artisan(runner, "/var/www/app");
      expect(await artisan.buildCaches()).toEqual(["view:cache: exit 255"]);
      expect(await artisan.migrateStatus()).toEqual({ ok: false, error: "exit 1" });
   });

   it("reports migrate:status errors", async () => {
      const runner = new FakeRunner().on("php artisan migrate:status", { code: 1, stderr: "SQLSTATE[HY000] [1045] Access denied\n" });
      expect(await new Artisan(runner, "/var/www/app").migrateStatus()).toEqual({ ok: false, error: "SQLSTATE[HY000] [1045] Access denied" });
   });
});
