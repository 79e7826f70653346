import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { deriveDefaultWebRoot, loadConfig, resolveConfig, validateDescriptor, writeConfigFromStub } from "../src/config.js";
import { OpsError } from "../src/errors.js";
import { tmpDir, writeFiles } from "./helpers.js";

const quiet = { env: {}, warn: () => undefined };

describe("resolveConfig", () => {
   it("derives FastPanel defaults from domain and owner", () => {
      const cfg = resolveConfig({ domain: "shop.example.test", webUser: "shop_usr" }, {}, quiet);
      expect(cfg.panel).toBe("fastpanel");
      expect(cfg.webRoot).toBe("/var/www/shop_usr/data/www/shop.example.test");
      expect(cfg.webGroup).toBe("shop_usr");
      expect(cfg.mysql).toEqual({
         host: "localhost",
         rootUser: "root",
         database: "shop_example_test_db",
         user: "shop_example_test_user",
         credentialsDir: "/root",
      });
      expect(cfg.backup).toEqual({ dir: "/var/backups/website", prefix: "backup_shop.example.test", retain: 5 });
      expect(cfg.nginx.manageSite).toBe(false);
      expect(cfg.http.baseUrls).toEqual(["http://localhost", "http://127.0.0.1", "https://shop.example.test"]);
      expect(cfg.requireRoot).toBe(true);
   });

   it("lets a plain host default its owner and manage the site", () => {
      const cfg = resolveConfig({ domain: "example.test", panel: "plain" }, {}, quiet);
      expect(cfg.webUser).toBe("www-data");
      expect(cfg.webRoot).toBe("/var/www/html");
      expect(cfg.nginx.manageSite).toBe(true);
   });

   it("prefers command line overrides", () => {
      const cfg = resolveConfig(
         { domain: "a.test", panel: "plain", webRoot: "/srv/a", errorPolicy: "abort" },
         { domain: "b.test", webRoot: "/srv/b", errorPolicy: "continue" },
         quiet,
      );
      expect([cfg.domain, cfg.webRoot, cfg.errorPolicy]).toEqual(["b.test", "/srv/b", "continue"]);
   });

   it("expands environment variables in paths", () => {
      const cfg = resolveConfig({ domain: "a.test", panel: "plain", backup: { dir: "${BACKUPS}/site" } }, {}, { env: { BACKUPS: "/mnt/bk" }, warn: () => undefined });
      expect(cfg.backup.dir).toBe("/mnt/bk/site");
   });

   it("requires a domain, and an owner on FastPanel", () => {
      expect(() => resolveConfig({}, {}, quiet)).toThrow(OpsError);
      expect(() => resolveConfig({ domain: "a.test" }, {}, quiet)).toThrow("`webUser` is required");
   });

   it("warns about schema problems without failing", () => {
      const warnings: string[] = [];
      const cfg = resolveConfig({ domain: "a.test", panel: "plain", retries: 3 }, {}, { env: {}, warn: (m) => warnings.push(m) });
      expect(cfg.domain).toBe("a.test");
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toContain("config validation warning");
   });

   it("reads hooks in both forms", () => {
      const cfg = resolveConfig({
         domain: "a.test",
         panel: "plain",
         hooks: { pre: ["php artisan down", { run: ["php", "artisan", "up"], continueOnError: true }, 42] },
      }, {}, quiet);
      expect(cfg.hooks.pre).toEqual([
         "php artisan down",
         { run: ["php", "artisan", "up"], continueOnError: true, shell: undefined, cwd: undefined, timeoutMs: undefined, env: undefined },
      ]);
   });
});

it("validates descriptors against the schema", () => {
   expect(validateDescriptor({ domain: "a.test", panel: "plain" })).toEqual([]);
   expect(validateDescriptor({ domain: "a.test", panel: "cpanel" }).length).toBeGreaterThan(0);
});

it("builds the FastPanel site path", () => {
   expect(deriveDefaultWebRoot("fastpanel", "u1", "a.test")).toBe("/var/www/u1/data/www/a.test");
});

describe("loadConfig", () => {
   it("finds .panelops.yml in the working directory", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { ".panelops.yml": "domain: a.test\npanel: plain\n" });
      const loaded = await loadConfig(undefined, dir);
      expect(loaded.raw).toEqual({ domain: "a.test", panel: "plain" });
      expect(loaded.filepath).toBe(path.join(dir, ".panelops.yml"));
   });

   it("reads the panelops key of package.json", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { "package.json": JSON.stringify({ name: "site", panelops: { domain: "b.test" } }) });
      expect((await loadConfig(undefined, dir)).raw).toEqual({ domain: "b.test" });
   });

   it("resolves a bare name to a built-in stub", async () => {
      const dir = await tmpDir();
      const loaded = await loadConfig("plain", dir);
      expect(path.basename(loaded.filepath ?? "")).toBe("plain.stub");
      expect(loaded.raw.panel).toBe("plain");
   });

   it("fails for an unknown stub", async () => {
      await expect(loadConfig("nosuch", await tmpDir())).rejects.toThrow("Config not found: nosuch");
   });
});

it("writes a descriptor from a stub once", async () => {
   const dir = await tmpDir();
   const { to } = writeConfigFromStub("fastpanel", ".panelops.yml", false, dir);
   expect(to).toBe(path.join(dir, ".panelops.yml"));
   expect(fs.readFileSync(to, "utf8")).toContain("panel: fastpanel");
   expect(() => writeConfigFromStub("fastpanel", ".panelops.yml", false, dir)).toThrow("already exists");
});
