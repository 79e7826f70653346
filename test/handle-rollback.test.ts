import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createBackup, listBackups, pruneBackups, safetyPrefix } from "../src/backup.js";
import { handleBackupCreate, handleBackupList, handleBackupPrune } from "../src/handle-backup.js";
import { handleRollback } from "../src/handle-rollback.js";
import { FakeRunner, ScriptedPrompter, fakeNet, makeContext, tmpDir, writeFiles } from "./helpers.js";

const PREFIX = "backup_example.test";

async function siteWithBackup() {
   const base = await tmpDir();
   const webRoot = path.join(base, "site");
   const dir = path.join(base, "backups");
   await writeFiles(webRoot, { "public/index.php": "<?php // good", ".env": "APP_KEY=base64:dGVzdA==\n" });
   const archive = await createBackup(webRoot, dir, PREFIX, new Date(2026, 0, 1, 0, 0, 0));
   await writeFiles(webRoot, { "public/index.php": "<?php // broken", "public/debug.php": "" });
   const raw = {
      webRoot,
      backup: { dir },
      php: { version: "8.3", fpmService: "php8.3-fpm", fpmSocket: "/run/php/test.sock" },
   };
   return { base, webRoot, dir, archive, raw };
}

describe("handleRollback", () => {
   it("restores the newest backup after saving the current state", async () => {
      const { webRoot, dir, archive, raw } = await siteWithBackup();
      const runner = new FakeRunner();
      const ctx = makeContext({ raw, runner, net: fakeNet({ "http://localhost": 200 }) });
      const result = await handleRollback(ctx);

      expect(result.ok).toBe(true);
      expect(result.restored).toBe(archive);
      expect(fs.readFileSync(path.join(webRoot, "public/index.php"), "utf8")).toBe("<?php // good");
      expect(fs.existsSync(path.join(webRoot, "public/debug.php"))).toBe(false);

      expect(path.basename(result.safetyBackup ?? "")).toMatch(/^backup_example\.test_safety_\d{8}_\d{6}_files\.tar\.gz$/);
      expect((await listBackups(dir, PREFIX)).map((b) => b.path)).toEqual([archive]);
      expect(runner.lines()).toEqual([
         `chown -R www-data:www-data ${webRoot}`,
         "php artisan config:clear",
         "php artisan route:clear",
         "php artisan view:clear",
         "php artisan cache:clear",
         "systemctl restart php8.3-fpm",
         "systemctl reload nginx",
      ]);
   });

   it("keeps only backup.retain safety backups", async () => {
      const { webRoot, dir, raw } = await siteWithBackup();
      const safety = safetyPrefix(PREFIX);
      for (const day of [1, 2, 3]) await createBackup(webRoot, dir, safety, new Date(2025, 0, day, 0, 0, 0));
      const ctx = makeContext({ raw: { ...raw, backup: { dir, retain: 2 } }, net: fakeNet({ "http://localhost": 200 }) });
      const result = await handleRollback(ctx);

      const kept = (await listBackups(dir, safety)).map((b) => b.path);
      expect(kept).toHaveLength(2);
      expect(kept[0]).toBe(result.safetyBackup);
      expect(path.basename(kept[1] ?? "")).toBe(`${safety}_20250103_000000_files.tar.gz`);
      expect(await listBackups(dir, PREFIX)).toHaveLength(1);
   });

   it("refuses a database restore without a dump", async () => {
      const { raw } = await siteWithBackup();
      const ctx = makeContext({ raw });
      await expect(handleRollback(ctx, { withDatabase: true })).rejects.toMatchObject({ code: "RESTORE_FAILED" });
   });

   it("imports the dump taken with the backup", async () => {
      const { archive, raw } = await siteWithBackup();
      fs.writeFileSync(archive.replace(/_files\.tar\.gz$/, "_database.sql"), "CREATE TABLE t (id int);\n");
      const runner = new FakeRunner();
      const ctx = makeContext({ raw, runner, net: fakeNet({ "http://localhost": 200 }) });
      await handleRollback(ctx, { withDatabase: true, safetyBackup: false, env: { PANELOPS_MYSQL_ROOT_PASSWORD: "test-secret" } });
      const call = runner.find("mysql -h localhost -u root example_test_db");
      expect(call?.opts.input).toBe("CREATE TABLE t (id int);\n");
      expect(call?.opts.env).toEqual({ MYSQL_PWD: "test-secret" });
   });

   it("lets the operator pick a backup", async () => {
      const { webRoot, dir, raw } = await siteWithBackup();
      const older = await createBackup(webRoot, dir, PREFIX, new Date(2025, 11, 1, 0, 0, 0));
      const prompter = new ScriptedPrompter(true, { select: [1] });
      const ctx = makeContext({ raw, prompter, net: fakeNet({ "http://localhost": 200 }) });
      const result = await handleRollback(ctx, { pick: true, safetyBackup: false });
      expect(prompter.asked).toEqual(["Choose a backup to restore"]);
      expect(result.restored).toBe(older);
   });

   it("fails when the restored site does not answer", async () => {
      const { raw } = await siteWithBackup();
      const ctx = makeContext({ raw, net: fakeNet({}) });
      await expect(handleRollback(ctx, { safetyBackup: false }))
         .rejects.toMatchObject({ code: "STEP_FAILED", message: "Probe site: http://localhost answered 000 (ECONNREFUSED)" });
   });

   it("changes nothing under dry-run", async () => {
      const { webRoot, raw } = await siteWithBackup();
      const ctx = makeContext({ raw, dryRun: true });
      const result = await handleRollback(ctx);
      expect(result.safetyBackup).toBeUndefined();
      expect(fs.readFileSync(path.join(webRoot, "public/index.php"), "utf8")).toBe("<?php // broken");
   });

   it("reports a missing backup", async () => {
      const { raw } = await siteWithBackup();
      await expect(handleRollback(makeContext({ raw }), { backup: "20200101_000000" }))
         .rejects.toThrow("Backup 20200101_000000 not found in");
   });
});

describe("backup commands", () => {
   it("creates an archive and a database dump", async () => {
      const { base, raw } = await siteWithBackup();
      const runner = new FakeRunner();
      const ctx = makeContext({ raw, runner });
      const file = await handleBackupCreate(ctx, { withDatabase: true, env: { PANELOPS_MYSQL_ROOT_PASSWORD: "test-secret" } });
      expect(file?.startsWith(path.join(base, "backups", `${PREFIX}_`))).toBe(true);
      const dump = runner.find("mysqldump");
      expect(dump?.args.slice(-2)).toEqual([`--result-file=${file?.replace(/_files\.tar\.gz$/, "_database.sql")}`, "example_test_db"]);
      expect(dump?.opts.env).toEqual({ MYSQL_PWD: "test-secret" });
   });

   it("lists and prunes", async () => {
      const { webRoot, dir, raw } = await siteWithBackup();
      await createBackup(webRoot, dir, PREFIX, new Date(2026, 0, 2, 0, 0, 0));
      await createBackup(webRoot, dir, PREFIX, new Date(2026, 0, 3, 0, 0, 0));
      const ctx = makeContext({ raw });
      expect(await handleBackupList(ctx)).toBe(3);

      const wouldGo = await handleBackupPrune(makeContext({ raw, dryRun: true }), 1);
      expect(wouldGo.map((p) => path.basename(p))).toEqual([`${PREFIX}_20260102_000000_files.tar.gz`, `${PREFIX}_20260101_000000_files.tar.gz`]);
      expect(await handleBackupList(ctx)).toBe(3);

      await handleBackupPrune(ctx, 1);
      expect((await listBackups(dir, PREFIX)).map((b) => b.stamp)).toEqual(["20260103_000000"]);
   });

   it("rejects a retain count that is not a whole number of at least 1", async () => {
      const { webRoot, dir, raw } = await siteWithBackup();
      await createBackup(webRoot, dir, PREFIX, new Date(2026, 0, 2, 0, 0, 0));
      const ctx = makeContext({ raw });
      for (const bad of [Number("abc"), 0, -1, 1.5]) {
         await expect(handleBackupPrune(ctx, bad)).rejects.toMatchObject({ code: "CONFIG_INVALID" });
         await expect(handleBackupPrune(makeContext({ raw, dryRun: true }), bad)).rejects.toMatchObject({ code: "CONFIG_INVALID" });
         await expect(pruneBackups(dir, PREFIX, bad)).rejects.toMatchObject({ code: "CONFIG_INVALID" });
      }
      expect(await listBackups(dir, PREFIX)).toHaveLength(2);
   });
});
