import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

type EnvLine =
   | { kind: "pair"; key: string; value: string; raw: string }
   | { kind: "other"; raw: string };

const PAIR = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.]*)\s*=\s*(.*)$/;

/**
 * A dotenv file that keeps comments, blank lines and key order when edited.
 */
export class EnvFile {
   private lines: EnvLine[];

   constructor(text = "") {
      this.lines = parseLines(text);
   }

   static async load(file: string): Promise<EnvFile> {
      return new EnvFile(await fs.promises.readFile(file, "utf8"));
   }

   has(key: string): boolean {
      return this.find(key) !== undefined;
   }

   get(key: string): string | undefined {
      return this.find(key)?.value;
   }

   keys(): string[] {
      return this.lines.flatMap((l) => (l.kind === "pair" ? [l.key] : []));
   }

   /** Returns true when the stored value changed. */
   set(key: string, value: string): boolean {
      const line = this.find(key);
      const raw = `${key}=${formatValue(value)}`;
      if (!line) {
         this.lines.push({ kind: "pair", key, value, raw });
         return true;
      }
      if (line.value === value) return false;
      line.value = value;
      line.raw = raw;
      return true;
   }

   /** Set several keys; returns the ones that changed. */
   setMany(values: Record<string, string>): string[] {
      return Object.entries(values).filter(([k, v]) => this.set(k, v)).map(([k]) => k);
   }

   delete(key: string): boolean {
      const before = this.lines.length;
      this.lines = this.lines.filter((l) => l.kind !== "pair" || l.key !== key);
      return this.lines.length !== before;
   }

   toString(): string {
      const body = this.lines.map((l) => l.raw).join("\n");
      return body.endsWith("\n") || body === "" ? body : `${body}\n`;
   }

   /** Written through a temp file and rename so readers never see a partial file. */
   async save(file: string): Promise<void> {
      let mode = 0o644;
      try { mode = (await fs.promises.stat(file)).mode & 0o777; } catch { /* new file */ }
      const tmp = path.join(path.dirname(file), `.${path.basename(file)}.panelops-${process.pid}.tmp`);
      await fs.promises.writeFile(tmp, this.toString(), { mode });
      await fs.promises.rename(tmp, file);
   }

   private find(key: string): Extract<EnvLine, { kind: "pair" }> | undefined {
      for (let i = this.lines.length - 1; i >= 0; i--) {
         const l = this.lines[i];
         if (l && l.kind === "pair" && l.key === key) return l;
      }
      return undefined;
   }
}

function parseLines(text: string): EnvLine[] {
   if (!text) return [];
   const rows = text.replace(/\r\n/g, "\n").split("\n");
   if (rows[rows.length - 1] === "") rows.pop();
   return rows.map((raw): EnvLine => {
      if (/^\s*#/.test(raw)) return { kind: "other", raw };
      const m = PAIR.exec(raw);
      if (!m || m[1] === undefined) return { kind: "other", raw };
      return { kind: "pair", key: m[1], value: parseValue(m[2] ?? ""), raw };
   });
}

export function parseValue(input: string): string {
   const s = input.trim();
   if (s.startsWith('"')) {
      let out = "";
      for (let i = 1; i < s.length; i++) {
         const c = s[i];
         if (c === "\\" && i + 1 < s.length) {
            const n = s[++i];
            out += n === "n" ? "\n" : n;
            continue;
         }
         if (c === '"') return out;
         out += c;
      }
      return out;
   }
   if (s.startsWith("'")) {
      const end = s.indexOf("'", 1);
      return end === -1 ? s.slice(1) : s.slice(1, end);
   }
   const hash = s.search(/\s#/);
   return (hash === -1 ? s : s.slice(0, hash)).trim();
}

export function formatValue(value: string): string {
   if (!/[\s#"'\\]/.test(value)) return value;
   return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

/** Laravel's APP_KEY format for the default AES-256-CBC cipher */
export function generateAppKey(): string {
   return `base64:${randomBytes(32).toString("base64")}`;
}

export type EnsureEnvResult = "present" | "from-example" | "created";

/**
 * Make sure <webRoot>/.env exists: copy .env.example, or write the given
 * fallback values when there is no example either.
 */
export async function ensureEnvFile(webRoot: string, fallback: Record<string, string> = {}): Promise<EnsureEnvResult> {
   const envPath = path.join(webRoot, ".env");
   if (fs.existsSync(envPath)) return "present";
   const example = path.join(webRoot, ".env.example");
   if (fs.existsSync(example)) {
      await fs.promises.copyFile(example, envPath);
      return "from-example";
   }
   const env = new EnvFile();
   env.setMany(fallback);
   await env.save(envPath);
   return "created";
}
