import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { EnvFile, ensureEnvFile, formatValue, generateAppKey, parseValue } from "../src/env-file.js";
import { tmpDir, writeFiles } from "./helpers.js";

describe("parseValue", () => {
   it("reads bare values and drops inline comments", () => {
      expect(parseValue("production")).toBe("production");
      expect(parseValue("mysql # driver")).toBe("mysql");
   });

   it("unescapes double-quoted values", () => {
      expect(parseValue('"say \\"hi\\""')).toBe('say "hi"');
      expect(parseValue('"line1\\nline2"')).toBe("line1\nline2");
      expect(parseValue('"has # hash" # comment')).toBe("has # hash");
   });

   it("takes single-quoted values literally", () => {
      expect(parseValue("'a\\nb'")).toBe("a\\nb");
   });
});

describe("formatValue", () => {
   it("leaves simple values bare", () => {
      expect(formatValue("base64:abc+/=")).toBe("base64:abc+/=");
   });

   it("quotes and escapes values that need it", () => {
      expect(formatValue("My App")).toBe('"My App"');
      expect(formatValue('p"w\\d')).toBe('"p\\"w\\\\d"');
   });
});

describe("EnvFile", () => {
   const text = "# app\nAPP_NAME=Laravel\n\nAPP_ENV=local\nDB_PASSWORD=\n";

   it("keeps comments and order when a value changes", () => {
      const env = new EnvFile(text);
      expect(env.set("APP_ENV", "production")).toBe(true);
      expect(env.toString()).toBe("# app\nAPP_NAME=Laravel\n\nAPP_ENV=production\nDB_PASSWORD=\n");
   });

   it("reports only the keys that changed", () => {
      const env = new EnvFile(text);
      expect(env.setMany({ APP_NAME: "Laravel", APP_ENV: "production", APP_URL: "https://example.test" })).toEqual(["APP_ENV", "APP_URL"]);
      expect(env.keys()).toEqual(["APP_NAME", "APP_ENV", "DB_PASSWORD", "APP_URL"]);
   });

   it("treats an empty value as present but falsy", () => {
      const env = new EnvFile(text);
      expect(env.has("DB_PASSWORD")).toBe(true);
      expect(env.get("DB_PASSWORD")).toBe("");
   });

   it("deletes keys", () => {
      const env = new EnvFile("A=1\nB=2\n");
      expect(env.delete("A")).toBe(true);
      expect(env.delete("missing")).toBe(false);
      expect(env.toString()).toBe("B=2\n");
   });

   it("saves through a temp file and keeps the mode", async () => {
      const dir = await tmpDir();
      const file = path.join(dir, ".env");
      await fs.promises.writeFile(file, "A=1\n", { mode: 0o600 });
      const env = await EnvFile.load(file);
      env.set("B", "two words");
      await env.save(file);
      expect(await fs.promises.readFile(file, "utf8")).toBe('A=1\nB="two words"\n');
      expect((await fs.promises.stat(file)).mode & 0o777).toBe(0o600);
      expect(await fs.promises.readdir(dir)).toEqual([".env"]);
   });
});

describe("ensureEnvFile", () => {
   it("copies .env.example when there is no .env", async () => {
      const dir = await tmpDir();
      await writeFiles(dir, { ".env.example": "APP_KEY=\n" });
      expect(await ensureEnvFile(dir)).toBe("from-example");
      expect(await fs.promises.readFile(path.join(dir, ".env"), "utf8")).toBe("APP_KEY=\n");
      expect(await ensureEnvFile(dir)).toBe("present");
   });

   it("writes the fallback when there is no example", async () => {
      const dir = await tmpDir();
      expect(await ensureEnvFile(dir, { APP_NAME: "Laravel" })).toBe("created");
      expect(await fs.promises.readFile(path.join(dir, ".env"), "utf8")).toBe("APP_NAME=Laravel\n");
   });
});

it("generates a 32-byte base64 app key", () => {
   const key = generateAppKey();
   expect(key.startsWith("base64:")).toBe(true);
   expect(Buffer.from(key.slice(7), "base64")).toHaveLength(32);
});
