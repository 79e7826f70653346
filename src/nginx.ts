import fs from "node:fs";
import path from "node:path";
import { globby } from "globby";
import type { CommandRunner } from "./exec.js";
import { Services } from "./services.js";
import type { ResolvedConfig } from "./types.js";
import { getTemplateDir, isDirSync, timestamp } from "./utils.js";

export type ListenDirective = {
   /** 1-based */
   line: number;
   raw: string;
   address?: string;
   port: number;
   ssl: boolean;
   defaultServer: boolean;
   ipv6: boolean;
};

export type FileListen = ListenDirective & { file: string };

const LISTEN = /(?:^|[\s{;])listen\s+([^;]+);/g;
const IPV4 = /^\d{1,3}(?:\.\d{1,3}){3}$/;

export function parseListenDirectives(text: string): ListenDirective[] {
   const out: ListenDirective[] = [];
   text.split(/\r?\n/).forEach((rawLine, i) => {
      const hash = rawLine.indexOf("#");
      const line = hash === -1 ? rawLine : rawLine.slice(0, hash);
      for (const m of line.matchAll(LISTEN)) {
         const parsed = parseListenArgs(m[1] ?? "");
         if (parsed) out.push({ line: i + 1, raw: `listen ${(m[1] ?? "").trim()};`, ...parsed });
      }
   });
   return out;
}

function parseListenArgs(args: string): Omit<ListenDirective, "line" | "raw"> | null {
   const [spec = "", ...flags] = args.trim().split(/\s+/);
   if (!spec || spec.startsWith("unix:")) return null;
   const ssl = flags.includes("ssl");
   const defaultServer = flags.includes("default_server") || flags.includes("default");

   if (spec.startsWith("[")) {
      const close = spec.indexOf("]");
      const address = spec.slice(1, close);
      const port = spec.slice(close + 1).startsWith(":") ? Number(spec.slice(close + 2)) : 80;
      return { address, port, ssl, defaultServer, ipv6: true };
   }
   if (/^\d+$/.test(spec)) return { port: Number(spec), ssl, defaultServer, ipv6: false };
   const colon = spec.lastIndexOf(":");
   if (colon === -1) return { address: spec, port: 80, ssl, defaultServer, ipv6: false };
   return { address: spec.slice(0, colon), port: Number(spec.slice(colon + 1)), ssl, defaultServer, ipv6: false };
}

export function isLoopback(address: string): boolean {
   return address === "localhost" || address.startsWith("127.") || address === "::1";
}

/**
 * Listeners pinned to one external IPv4 address: the site then never answers on
 * 127.0.0.1, which breaks every local health check.
 */
export function findIpBoundListeners<T extends ListenDirective>(directives: T[]): T[] {
   return directives.filter((d) =>
      !d.ipv6 && d.address !== undefined && IPV4.test(d.address) && !isLoopback(d.address) && d.address !== "0.0.0.0");
}

/** `listen 203.0.113.7:80 default_server;` becomes `listen 80 default_server;` */
export function rewriteIpBoundListen(text: string): { text: string; rewrites: number } {
   let rewrites = 0;
   const lines = text.split("\n").map((line) => {
      const hash = line.indexOf("#");
      const code = hash === -1 ? line : line.slice(0, hash);
      const comment = hash === -1 ? "" : line.slice(hash);
      return code.replace(/(\blisten\s+)(\d{1,3}(?:\.\d{1,3}){3})(?::(\d+))?(?=[\s;])/g, (all, head: string, ip: string, port: string | undefined) => {
         if (isLoopback(ip) || ip === "0.0.0.0") return all;
         rewrites++;
         return `${head}${port ?? "80"}`;
      }) + comment;
   });
   return { text: lines.join("\n"), rewrites };
}

/** Replace {{token}} placeholders; unknown tokens are left as written. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
   return template.replace(/\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g, (all, key: string) => vars[key] ?? all);
}

export function readTemplate(name: string, dir = getTemplateDir()): string {
   return fs.readFileSync(path.join(dir, name), "utf8");
}

export function renderSiteConfig(vars: { domain: string; publicDir: string; fpmSocket: string; listen?: string }): string {
   return renderTemplate(readTemplate("nginx-site.conf"), { listen: "80", ...vars });
}

export type BindingKind = "local" | "universal";

export const BINDING_FILES: Record<BindingKind, string> = {
   local: "panelops-local-binding.conf",
   universal: "panelops-universal-binding.conf",
};

export function renderBindingConfig(kind: BindingKind, vars: { domain: string; publicDir: string; fpmSocket: string }): string {
   const listen = kind === "local" ? "127.0.0.1:80" : "80";
   const serverName = kind === "local" ? "localhost 127.0.0.1" : "_";
   return renderTemplate(readTemplate("local-binding.conf"), { ...vars, listen, serverName });
}

/** Copy `file` to `file.backup.<stamp>` and return the copy's path. */
export async function backupConfig(file: string, now: Date = new Date()): Promise<string> {
   const dest = `${file}.backup.${timestamp(now)}`;
   await fs.promises.copyFile(file, dest);
   return dest;
}

export async function restoreConfig(backup: string, file: string): Promise<void> {
   await fs.promises.copyFile(backup, file);
}

export class Nginx {
   constructor(private readonly runner: CommandRunner, private readonly cfg: ResolvedConfig["nginx"]) { }

   /** `nginx -t`; output is what nginx printed (it writes to stderr) */
   async test(): Promise<{ ok: boolean; output: string }> {
      const r = await this.runner.run("nginx", ["-t"], { allowFailure: true, readOnly: true });
      return { ok: r.code === 0, output: `${r.stderr}${r.stdout}`.trim() };
   }

   async reload(): Promise<"reloaded" | "restarted"> {
      const services = new Services(this.runner);
      if (await services.reload("nginx")) return "reloaded";
      await services.restart("nginx");
      return "restarted";
   }

   /** Every config file nginx may load, deduplicated by real path. */
   async scanConfigs(): Promise<string[]> {
      const dirs = [this.cfg.confDir, this.cfg.sitesEnabled, ...this.cfg.panelConfigDirs].filter(isDirSync);
      const seen = new Set<string>();
      const out: string[] = [];
      if (fs.existsSync(this.cfg.mainConfig)) out.push(this.cfg.mainConfig);
      for (const dir of dirs) {
         // sites-enabled entries usually carry no extension
         const pattern = dir === this.cfg.sitesEnabled ? "*" : "**/*.conf";
         const files = await globby(pattern, { cwd: dir, absolute: true, onlyFiles: true, followSymbolicLinks: true, dot: false });
         out.push(...files.sort());
      }
      return out.filter((f) => {
         let real = f;
         try { real = fs.realpathSync(f); } catch { /* dangling link */ }
         if (seen.has(real)) return false;
         seen.add(real);
         return true;
      });
   }

   async listeners(files: string[]): Promise<FileListen[]> {
      const all: FileListen[] = [];
      for (const file of files) {
         let text: string;
         try { text = await fs.promises.readFile(file, "utf8"); } catch { continue; }
         all.push(...parseListenDirectives(text).map((d) => ({ ...d, file })));
      }
      return all;
   }

   sitePath(name: string): string {
      return path.join(this.cfg.sitesAvailable, name);
   }

   /** Write the site and link it into sites-enabled; returns true when anything changed. */
   async installSite(name: string, content: string): Promise<boolean> {
      const available = this.sitePath(name);
      const enabled = path.join(this.cfg.sitesEnabled, name);
      let changed = false;
      const current = fs.existsSync(available) ? await fs.promises.readFile(available, "utf8") : null;
      if (current !== content) {
         if (current !== null) await backupConfig(available);
         await fs.promises.mkdir(this.cfg.sitesAvailable, { recursive: true });
         await fs.promises.writeFile(available, content, { mode: 0o644 });
         changed = true;
      }
      if (!fs.existsSync(enabled)) {
         await fs.promises.mkdir(this.cfg.sitesEnabled, { recursive: true });
         await fs.promises.symlink(available, enabled);
         changed = true;
      }
      return changed;
   }

   /** Drop the distribution's catch-all site link. */
   async disableDefaultSite(): Promise<boolean> {
      const link = path.join(this.cfg.sitesEnabled, "default");
      try {
         await fs.promises.lstat(link);
      } catch {
         return false;
      }
      await fs.promises.unlink(link);
      return true;
   }

   bindingPath(kind: BindingKind): string {
      return path.join(this.cfg.confDir, BINDING_FILES[kind]);
   }
}
