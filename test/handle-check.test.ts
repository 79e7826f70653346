import path from "node:path";
import { describe, expect, it } from "vitest";
import { LARAVEL_PHP_EXTENSIONS } from "../src/defaults.js";
import { handleCheck, ufwMissingPorts } from "../src/handle-check.js";
import { FakeRunner, ScriptedPrompter, makeContext, tmpDir, writeFiles } from "./helpers.js";

const UFW_ACTIVE = [
   "Status: active",
   "",
   "To                         Action      From",
   "--                         ------      ----",
   "OpenSSH                    ALLOW       Anywhere",
   "Nginx Full                 ALLOW       Anywhere",
   "OpenSSH (v6)               ALLOW       Anywhere (v6)",
].join("\n");

describe("ufwMissingPorts", () => {
   it("accepts application profiles", () => {
      expect(ufwMissingPorts(UFW_ACTIVE)).toEqual([]);
   });

   it("accepts numeric rules with a protocol", () => {
      expect(ufwMissingPorts("Status: active\n22/tcp                     ALLOW       Anywhere\n80                         ALLOW       Anywhere\n"))
         .toEqual(["443"]);
   });

   it("does not count DENY rules", () => {
      expect(ufwMissingPorts("443                        DENY        Anywhere\n", ["443"])).toEqual(["443"]);
   });
});

function healthyRunner(php = "8.3.6") {
   return new FakeRunner()
      .on("php -r", { stdout: php })
      .on("php -m", { stdout: `[PHP Modules]\n${LARAVEL_PHP_EXTENSIONS.join("\n")}\n` })
      .on("composer --version", { stdout: "Composer version 2.7.7 2024-06-10 22:11:12" })
      .on("ufw status", { stdout: UFW_ACTIVE });
}

async function release(files = ["composer.json", "package.json", "artisan", ".env.example"]) {
   const base = await tmpDir();
   const sourceDir = path.join(base, "release");
   await writeFiles(sourceDir, Object.fromEntries(files.map((f) => [f, ""])));
   return { sourceDir, webRoot: path.join(base, "site") };
}

describe("handleCheck", () => {
   it("reports ready on a prepared host", async () => {
      const ctx = makeContext({ raw: await release(), runner: healthyRunner() });
      const report = await handleCheck(ctx, { askMysqlPassword: false });
      expect(report.ready).toBe(true);
      expect(report.tally.fail).toBe(0);
      expect(ctx.output).toContain("✓ PHP version: 8.3.6");
      expect(ctx.output).toContain("✓ Composer: Composer version 2.7.7 2024-06-10 22:11:12");
      expect(ctx.output).toContain("✓ MySQL root connection");
      expect(ctx.output).toContain("✓ UFW ports: 22, 80, 443");
      expect(ctx.output).toContain(`⚠ Web root exists: ${ctx.cfg.webRoot} will be created`);
   });

   it("fails on an old PHP and an incomplete release", async () => {
      const ctx = makeContext({ raw: await release(["composer.json", "artisan"]), runner: healthyRunner("8.0.30") });
      const report = await handleCheck(ctx, { askMysqlPassword: false });
      expect(report.ready).toBe(false);
      expect(report.tally.fail).toBe(3);
      expect(ctx.output).toContain("✗ PHP version: 8.0.30 (need >= 8.1)");
      expect(ctx.output).toContain("✗ Source package.json: missing");
      expect(ctx.output).toContain("✗ Source .env.example: missing");
   });

   it("names missing extensions with an install hint", async () => {
      const runner = healthyRunner().on("php -m", { stdout: "bcmath\nctype\n" });
      const ctx = makeContext({ raw: await release(), runner });
      await handleCheck(ctx, { askMysqlPassword: false });
      const line = ctx.output.find((l) => l.startsWith("✗ PHP extensions: "));
      expect(line).toBe(
         "✗ PHP extensions: missing fileinfo, json, mbstring, openssl, pdo, pdo_mysql, tokenizer, xml, curl, zip, gd, intl, redis - " +
         "apt install php8.3-fileinfo php8.3-json php8.3-mbstring php8.3-openssl php8.3-pdo php8.3-mysql php8.3-tokenizer php8.3-xml php8.3-curl php8.3-zip php8.3-gd php8.3-intl php8.3-redis",
      );
   });

   it("fails the root connection only when a password was given", async () => {
      const runner = healthyRunner().on(/^mysql -h localhost -u root -N -B -e SELECT 1$/, { code: 1 });
      const prompter = new ScriptedPrompter(true, { secret: ["test-secret"] });
      const ctx = makeContext({ raw: await release(), runner, prompter });
      const report = await handleCheck(ctx);
      expect(prompter.asked).toEqual(["MySQL root password (Enter to skip)"]);
      expect(runner.find("mysql -h localhost -u root -N")?.opts.env).toEqual({ MYSQL_PWD: "test-secret" });
      expect(ctx.output).toContain("✗ MySQL root connection: cannot connect as root@localhost");
      expect(report.ready).toBe(false);
   });

   it("flags missing build tools", async () => {
      const runner = new FakeRunner(["php", "mysql", "nginx"]).on("php -r", { stdout: "8.3.6" })
         .on("php -m", { stdout: LARAVEL_PHP_EXTENSIONS.join("\n") });
      const ctx = makeContext({ raw: await release(), runner });
      const report = await handleCheck(ctx, { askMysqlPassword: false });
      expect(ctx.output).toContain("✗ Composer: not installed");
      expect(ctx.output).toContain("✗ Node.js: not installed");
      expect(ctx.output).toContain("✗ npm: not installed");
      expect(ctx.output).toContain("• UFW: not installed");
      expect(report.tally.fail).toBe(3);
   });
});
