import { cosmiconfig } from "cosmiconfig";
import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { Ajv } from "ajv";
import pc from "picocolors";
import { DEFAULT_TIMEOUT_MS, baseDefaults } from "./defaults.js";
import { OpsError } from "./errors.js";
import type { ConfirmMode, ErrorPolicy, HookItem, HooksConfig, PanelKind, ResolvedConfig } from "./types.js";
import {
  MODULE_NAME,
  appendStubIfNoExt,
  envExpand,
  getBuiltinStubDir,
  isRecord,
  parseUnknownConfig,
  slugify,
} from "./utils.js";

const SCHEMA_PATH = new URL("../schema/panelops.schema.json", import.meta.url);

export const SEARCH_PLACES = [
   ".panelops",
   ".panelops.json",
   ".panelops.yaml",
   ".panelops.yml",
   "panelops.config.yaml",
   "package.json",
];

/** Values given on the command line; they win over the file. */
export type ConfigOverrides = {
   domain?: string;
   webRoot?: string;
   webUser?: string;
   sourceDir?: string;
   logDir?: string;
   errorPolicy?: ErrorPolicy;
   confirm?: ConfirmMode;
};

export type LoadedConfig = {
   raw: Record<string, unknown>;
   filepath?: string;
};

export type ResolveOptions = {
   env?: NodeJS.ProcessEnv;
   warn?: (msg: string) => void;
};

/**
 * Find the stub file for a name: exact path, then ./stubs, then the built-in stubs.
 * Returns null when none exists.
 */
export function findStub(name: string, cwd = process.cwd()): string | null {
   const fp = appendStubIfNoExt(name);
   const abs = path.isAbsolute(fp) ? fp : path.resolve(cwd, fp);
   const candidates = [
      abs,
      path.join(cwd, "stubs", path.basename(abs)),
      path.join(getBuiltinStubDir(), path.basename(abs)),
   ];
   return candidates.find((c) => fs.existsSync(c)) ?? null;
}

export async function loadConfig(explicitPath?: string, cwd = process.cwd()): Promise<LoadedConfig> {
   const explorer = cosmiconfig(MODULE_NAME, {
      searchPlaces: SEARCH_PLACES,
      loaders: {
         ".yaml": (_fp, content) => YAML.parse(content),
         ".yml": (_fp, content) => YAML.parse(content),
         noExt: (_fp, content) => parseUnknownConfig(content), // extensionless .panelops
      },
   });

   let result: { config: unknown; filepath?: string } | undefined;

   if (explicitPath) {
      const fp = appendStubIfNoExt(explicitPath);
      if (fp.endsWith(".stub")) {
         const found = findStub(fp, cwd);
         if (!found) {
            throw OpsError.configInvalid(`Config not found: ${explicitPath} (.stub assumed). Looked in: ${path.resolve(cwd, fp)}, ./stubs, and built-in stubs.`);
         }
         result = { config: parseUnknownConfig(fs.readFileSync(found, "utf8")), filepath: found };
      } else {
         const r = await explorer.load(path.resolve(cwd, fp));
         if (r) result = { config: r.config, filepath: r.filepath };
      }
   } else {
      const r = await explorer.search(cwd);
      if (r) result = { config: r.config, filepath: r.filepath };
   }

   // A dotfile may nest everything under { panelops: {...} } like package.json does
   const config = result?.config;
   const inner = isRecord(config) ? config[MODULE_NAME] : undefined;
   const raw = isRecord(inner) ? inner : isRecord(config) ? config : {};
   return { raw, filepath: result?.filepath };
}

/** Schema problems as "path message" lines; empty when the descriptor is valid. */
export function validateDescriptor(raw: Record<string, unknown>): string[] {
   const ajv = new Ajv({ allowUnionTypes: true, allErrors: true, strict: false });
   const validate = ajv.compile(JSON.parse(fs.readFileSync(SCHEMA_PATH, "utf8")));
   if (validate(raw)) return [];
   return (validate.errors ?? []).map((e) => `${e.instancePath || "<root>"} ${e.message ?? "is invalid"}`);
}

export function resolveConfig(raw: Record<string, unknown>, overrides: ConfigOverrides = {}, opts: ResolveOptions = {}): ResolvedConfig {
   const env = opts.env ?? process.env;
   const warn = opts.warn ?? ((m: string) => console.warn(pc.yellow(m)));

   // ---- Schema validation (warn-only); required fields are enforced below ----
   try {
      const problems = validateDescriptor(raw);
      if (problems.length) warn(`[panelops] config validation warning: ${problems.join("; ")}`);
   } catch (e) {
      warn(`[panelops] config validation skipped: ${e instanceof Error ? e.message : String(e)}`);
   }

   const x = (s: string) => envExpand(s, env);

   const domain = overrides.domain ?? str(raw, "domain");
   if (!domain) throw OpsError.configInvalid("`domain` is required (set it in .panelops.yml or pass --domain)");

   const panel: PanelKind = oneOf(str(raw, "panel"), ["fastpanel", "plain"] as const) ?? "fastpanel";
   const webUser = overrides.webUser ?? str(raw, "webUser") ?? (panel === "plain" ? "www-data" : undefined);
   if (!webUser) throw OpsError.configInvalid("`webUser` is required for a FastPanel site (the panel's site owner)");
   const webGroup = str(raw, "webGroup") ?? webUser;

   const webRoot = x(overrides.webRoot ?? str(raw, "webRoot") ?? deriveDefaultWebRoot(panel, webUser, domain));
   const base = baseDefaults();
   const slug = slugify(domain);

   const backup = rec(raw, "backup");
   const php = rec(raw, "php");
   const mysql = rec(raw, "mysql");
   const nginx = rec(raw, "nginx");
   const http = rec(raw, "http");
   const burst = rec(http, "burst");
   const clean = rec(raw, "clean");

   return {
      panel,
      domain,
      webUser,
      webGroup,
      webRoot: path.resolve(webRoot),
      sourceDir: path.resolve(x(overrides.sourceDir ?? str(raw, "sourceDir") ?? base.sourceDir)),
      backup: {
         dir: x(str(backup, "dir") ?? "/var/backups/website"),
         prefix: str(backup, "prefix") ?? `backup_${domain}`,
         retain: Math.max(1, Math.floor(num(backup, "retain") ?? 5)),
      },
      php: {
         minVersion: str(php, "minVersion") ?? base.php.minVersion,
         version: str(php, "version"),
         extensions: strList(php, "extensions") ?? base.php.extensions,
         fpmService: str(php, "fpmService"),
         fpmSocket: optional(str(php, "fpmSocket"), x),
      },
      mysql: {
         host: str(mysql, "host") ?? "localhost",
         rootUser: str(mysql, "rootUser") ?? "root",
         database: str(mysql, "database") ?? `${slug}_db`,
         user: str(mysql, "user") ?? `${slug}_user`,
         credentialsDir: x(str(mysql, "credentialsDir") ?? "/root"),
      },
      nginx: {
         mainConfig: x(str(nginx, "mainConfig") ?? base.nginx.mainConfig),
         sitesAvailable: x(str(nginx, "sitesAvailable") ?? base.nginx.sitesAvailable),
         sitesEnabled: x(str(nginx, "sitesEnabled") ?? base.nginx.sitesEnabled),
         confDir: x(str(nginx, "confDir") ?? base.nginx.confDir),
         panelConfigDirs: (strList(nginx, "panelConfigDirs") ?? base.nginx.panelConfigDirs).map(x),
         errorLog: x(str(nginx, "errorLog") ?? base.nginx.errorLog),
         manageSite: bool(nginx, "manageSite") ?? panel === "plain",
         serverIp: str(nginx, "serverIp"),
      },
      http: {
         baseUrls: strList(http, "baseUrls") ?? ["http://localhost", "http://127.0.0.1", `https://${domain}`],
         pages: strList(http, "pages") ?? [""],
         timeoutMs: num(http, "timeoutMs") ?? DEFAULT_TIMEOUT_MS,
         burst: {
            rounds: num(burst, "rounds") ?? 10,
            concurrency: Math.max(1, num(burst, "concurrency") ?? 6),
         },
      },
      clean: {
         dirs: strList(clean, "dirs") ?? base.clean.dirs,
         files: strList(clean, "files") ?? base.clean.files,
         patterns: strList(clean, "patterns") ?? base.clean.patterns,
      },
      preserve: strList(raw, "preserve") ?? base.preserve,
      exclude: strList(raw, "exclude") ?? base.exclude,
      services: strList(raw, "services") ?? base.services,
      logDir: x(overrides.logDir ?? str(raw, "logDir") ?? base.logDir),
      errorPolicy: overrides.errorPolicy ?? oneOf(str(raw, "errorPolicy"), ["abort", "continue"] as const) ?? base.errorPolicy,
      confirm: overrides.confirm ?? oneOf(str(raw, "confirm"), ["auto", "always", "never"] as const) ?? base.confirm,
      requireRoot: bool(raw, "requireRoot") ?? base.requireRoot,
      hooks: readHooks(rec(raw, "hooks")),
   };
}

/** FastPanel keeps each site under its owner's home: /var/www/<user>/data/www/<domain> */
export function deriveDefaultWebRoot(panel: PanelKind, webUser: string, domain: string): string {
   return panel === "fastpanel" ? path.posix.join("/var/www", webUser, "data/www", domain) : "/var/www/html";
}

/** Copy a stub into the working directory as the project's descriptor. */
export function writeConfigFromStub(stub: string, outPath: string, force = false, cwd = process.cwd()): { from: string; to: string } {
   const from = findStub(stub, cwd);
   if (!from) throw OpsError.configInvalid(`Could not find stub "${stub}" (looked in ./, ./stubs and built-in stubs)`);
   const to = path.resolve(cwd, outPath);
   if (fs.existsSync(to) && !force) throw OpsError.configInvalid(`${to} already exists (use --force to overwrite)`);
   fs.writeFileSync(to, fs.readFileSync(from, "utf8"), "utf8");
   return { from, to };
}

// ---------------- field readers ----------------

function str(o: Record<string, unknown>, k: string): string | undefined {
   const v = o[k];
   if (typeof v === "number") return String(v);
   return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

function num(o: Record<string, unknown>, k: string): number | undefined {
   const v = o[k];
   const n = typeof v === "string" ? Number(v) : v;
   return typeof n === "number" && Number.isFinite(n) ? n : undefined;
}

function bool(o: Record<string, unknown>, k: string): boolean | undefined {
   const v = o[k];
   return typeof v === "boolean" ? v : undefined;
}

function strList(o: Record<string, unknown>, k: string): string[] | undefined {
   const v = o[k];
   if (!Array.isArray(v)) return undefined;
   return v.filter((i): i is string => typeof i === "string");
}

function rec(o: Record<string, unknown>, k: string): Record<string, unknown> {
   const v = o[k];
   return isRecord(v) ? v : {};
}

function oneOf<T extends string>(v: string | undefined, allowed: readonly T[]): T | undefined {
   return allowed.find((a) => a === v);
}

function optional(v: string | undefined, f: (s: string) => string): string | undefined {
   return v === undefined ? undefined : f(v);
}

function readHooks(o: Record<string, unknown>): HooksConfig {
   const out: HooksConfig = {};
   for (const phase of ["pre", "post"] as const) {
      const list = o[phase];
      if (!Array.isArray(list)) continue;
      out[phase] = list.map(readHookItem).filter((h): h is HookItem => h !== null);
   }
   return out;
}

function readHookItem(v: unknown): HookItem | null {
   if (typeof v === "string") return v;
   if (!isRecord(v)) return null;
   const run = v.run;
   let cmd: string | string[];
   if (typeof run === "string") cmd = run;
   else if (Array.isArray(run) && run.every((a): a is string => typeof a === "string") && run.length) cmd = run;
   else return null;

   const env = isRecord(v.env)
      ? Object.fromEntries(Object.entries(v.env).filter((e): e is [string, string] => typeof e[1] === "string"))
      : undefined;
   return {
      run: cmd,
      shell: bool(v, "shell"),
      cwd: str(v, "cwd"),
      timeoutMs: num(v, "timeoutMs"),
      env,
      continueOnError: bool(v, "continueOnError"),
   };
}
