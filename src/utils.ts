import os from "node:os";
import path from "node:path";
import fsSync from "node:fs";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

/** Name used by cosmiconfig for search (".panelops", "package.json" → { panelops: {...} }) */
export const MODULE_NAME = "panelops";

// Package root: one level above src/ (tsx, vitest) or dist/ (built CLI)
export function getPackageRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..");
}

// Where the package’s own stubs live (bundled with the lib)
export function getBuiltinStubDir(): string {
  return path.join(getPackageRoot(), "stubs");
}

export function getTemplateDir(): string {
  return path.join(getPackageRoot(), "templates");
}

/**
 * If a config path has no extension and isn’t a dotfile, assume it's a stub name and append ".stub".
 * Examples:
 *   "fastpanel"          -> "fastpanel.stub"
 *   "plain.stub"         -> "plain.stub"
 *   ".panelops"          -> ".panelops"        (dotfile, leave as-is)
 *   "panelops.yaml"      -> "panelops.yaml"    (has ext, leave as-is)
 */
export function appendStubIfNoExt(input: string): string {
  const base = path.basename(input);
  if (/\.(stub|json|ya?ml)$/i.test(base)) return input;
  if (base.startsWith(".")) return input;
  if (path.extname(base)) return input;
  return input.endsWith(".stub") ? input : input + ".stub";
}

/**
 * Parse a config file whose format is unknown (YAML or JSON).
 * YAML parser handles JSON too, so prefer YAML here.
 */
export function parseUnknownConfig(content: string): unknown {
  try {
    return YAML.parse(content);
  } catch {
    try { return JSON.parse(content); }
    catch { return {}; }
  }
}

/**
 * Expand environment variables and ~ in simple paths/strings.
 * Supports:
 *   - ${VAR} and $VAR
 *   - leading "~" → user home
 */
export function envExpand(input: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  if (!input) return "";
  let s = String(input);

  s = s.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? "");
  // $VAR (avoid $$ or $ followed by non-identifier)
  s = s.replace(/(?<!\$)\$([A-Za-z_][A-Za-z0-9_]*)/g, (_, name: string) => env[name] ?? "");

  if (s === "~" || s.startsWith("~/")) {
    s = path.join(os.homedir(), s.slice(1));
  }

  return s;
}

export function isDirSync(p: string): boolean {
  try { return fsSync.statSync(p).isDirectory(); } catch { return false; }
}

export function isFileSync(p: string): boolean {
  try { return fsSync.statSync(p).isFile(); } catch { return false; }
}

export function pathExistsSync(p: string): boolean {
  try { fsSync.lstatSync(p); return true; } catch { return false; }
}

/** 20240131_094501, the stamp used for backups and run logs */
export function timestamp(d: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

export function humanSize(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let i = 0;
  let n = bytes;
  while (n >= 1024 && i < units.length - 1) { n /= 1024; i++; }
  return `${i === 0 ? n : n.toFixed(1)} ${units[i]}`;
}

export const normRel = (p: string) => p.replaceAll("\\", "/").replace(/^\.?\//, "").replace(/\/+$/, "");

export function quote(s: string): string {
  return /[\s"'$`\\]/.test(s) ? JSON.stringify(s) : s;
}

/** Lower-case slug limited to what MySQL accepts unquoted, used for default db/user names. */
export function slugify(s: string, max = 24): string {
  const slug = s.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
  return slug.slice(0, max).replace(/_+$/, "") || "app";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
