import fs from "node:fs";
import { capture, type CommandRunner } from "./exec.js";

/** Numeric comparison of dotted versions; "8.10" > "8.9". Suffixes such as "-1ubuntu" are ignored. */
export function compareVersions(a: string, b: string): number {
   const pa = a.split(/[.+-]/).map((p) => parseInt(p, 10));
   const pb = b.split(/[.+-]/).map((p) => parseInt(p, 10));
   const n = Math.max(pa.length, pb.length);
   for (let i = 0; i < n; i++) {
      const x = Number.isNaN(pa[i] ?? 0) ? 0 : (pa[i] ?? 0);
      const y = Number.isNaN(pb[i] ?? 0) ? 0 : (pb[i] ?? 0);
      if (x !== y) return x < y ? -1 : 1;
   }
   return 0;
}

export function versionAtLeast(version: string, min: string): boolean {
   return compareVersions(version, min) >= 0;
}

/** "8.3.6" -> "8.3" */
export function majorMinor(version: string): string {
   const m = /^(\d+)\.(\d+)/.exec(version.trim());
   return m ? `${m[1]}.${m[2]}` : version.trim();
}

/** Lower-cased module names from `php -m` output, section headers dropped. */
export function parseModules(output: string): Set<string> {
   const mods = new Set<string>();
   for (const line of output.split(/\r?\n/)) {
      const t = line.trim();
      if (!t || t.startsWith("[")) continue;
      mods.add(t.toLowerCase());
   }
   return mods;
}

export function missingExtensions(required: string[], installed: Set<string>): string[] {
   return required.filter((ext) => !installed.has(ext.toLowerCase()));
}

/** apt package names for missing extensions, e.g. `php8.3-mbstring` */
export function installHint(missing: string[], version?: string): string {
   const prefix = version ? `php${majorMinor(version)}` : "php";
   return `apt install ${missing.map((e) => `${prefix}-${e.replace(/^pdo_/, "")}`).join(" ")}`;
}

export function fpmServiceName(version?: string): string {
   return version ? `php${majorMinor(version)}-fpm` : "php-fpm";
}

export function fpmSocketPath(version?: string): string {
   return version ? `/var/run/php/php${majorMinor(version)}-fpm.sock` : "/var/run/php/php-fpm.sock";
}

export class Php {
   constructor(private readonly runner: CommandRunner) { }

   /** Full PHP_VERSION, or null when php is missing or fails */
   async version(): Promise<string | null> {
      const v = await capture(this.runner, "php", ["-r", "echo PHP_VERSION;"]);
      return /^\d+\.\d+/.test(v) ? v : null;
   }

   async modules(): Promise<Set<string>> {
      return parseModules(await capture(this.runner, "php", ["-m"]));
   }

   /**
    * Socket of the FPM pool: the configured one, the versioned default, then the
    * first php*-fpm.sock found in /var/run/php.
    */
   detectSocket(version?: string, configured?: string, runDir = "/var/run/php"): string {
      if (configured) return configured;
      const preferred = fpmSocketPath(version);
      if (fs.existsSync(preferred)) return preferred;
      try {
         const found = fs.readdirSync(runDir).filter((f) => /^php.*-fpm\.sock$/.test(f)).sort().reverse();
         if (found[0]) return `${runDir}/${found[0]}`;
      } catch {
         // no run dir; fall through to the versioned default
      }
      return preferred;
   }
}
