// src/hook.ts
import path from "node:path";
import type { CommandRunner } from "./exec.js";
import type { Reporter } from "./reporter.js";
import type { HookItem, HooksConfig } from "./types.js";
import { errorMessage, quote } from "./utils.js";

export type HookPhase = "pre" | "post";

export type HookContext = {
   webRoot: string;              // resolved absolute web root
   domain: string;
   backup?: string;              // archive taken by this deploy (post phase)
   configPath?: string;          // where the descriptor was loaded from (if any)
};

export type RunHooksOptions = {
   runner: CommandRunner;
   reporter: Reporter;
   extra?: string[];             // appended at the end of the phase
   defaultTimeoutMs?: number;    // default 10m
   asUser?: string;              // hooks run as the site owner
};

type NormalizedHook = {
   run: string | string[];
   shell: boolean;
   cwd: string;
   timeoutMs: number;
   env: Record<string, string>;
   continueOnError: boolean;
};

const DEFAULT_TIMEOUT = 10 * 60 * 1000;

/** Runs one phase in order; returns how many hooks ran. */
export async function runHookPhase(
   hooks: HooksConfig,
   phase: HookPhase,
   ctx: HookContext,
   opts: RunHooksOptions,
): Promise<number> {
   const list: HookItem[] = [...(hooks[phase] ?? []), ...(opts.extra ?? [])];
   if (!list.length) return 0;

   opts.reporter.dim(`[hooks] ${phase} (${list.length})`);

   for (const raw of list) {
      const item = normalizeHookItem(raw, ctx, opts.defaultTimeoutMs ?? DEFAULT_TIMEOUT);
      const cwd = resolveCwd(ctx.webRoot, item.cwd);
      const { cmd, args } = toCommand(item.run, item.shell);
      const display = typeof item.run === "string" ? item.run : item.run.map(quote).join(" ");

      opts.reporter.dim(`  • ${display}${cwd !== ctx.webRoot ? `  (cwd=${rel(ctx.webRoot, cwd)})` : ""}`);
      try {
         const r = await opts.runner.run(cmd, args, {
            cwd,
            env: { ...buildEnv(ctx), ...item.env },
            timeoutMs: item.timeoutMs,
            asUser: opts.asUser,
         });
         if (r.stdout.trim()) opts.reporter.attach(`hook ${display}`, r.stdout);
      } catch (e) {
         if (!item.continueOnError) throw e;
         opts.reporter.warn(`Hook failed (continuing): ${errorMessage(e)}`);
      }
   }

   opts.reporter.dim(`[hooks] ${phase} done`);
   return list.length;
}

export function normalizeHookItem(h: HookItem, ctx: HookContext, defaultTimeoutMs = DEFAULT_TIMEOUT): NormalizedHook {
   const fill = (s: string) => interpolate(s, ctx);
   if (typeof h === "string") {
      return { run: fill(h), shell: true, cwd: "", timeoutMs: defaultTimeoutMs, env: {}, continueOnError: false };
   }
   const run = Array.isArray(h.run) ? h.run.map(fill) : fill(h.run);
   return {
      run,
      shell: h.shell ?? (typeof run === "string"),
      cwd: h.cwd ? fill(h.cwd) : "",
      timeoutMs: h.timeoutMs ?? defaultTimeoutMs,
      env: Object.fromEntries(Object.entries(h.env ?? {}).map(([k, v]) => [k, fill(v)])),
      continueOnError: !!h.continueOnError,
   };
}

/** Shell strings go through `sh -c`; arrays are spawned directly. */
export function toCommand(run: string | string[], shell: boolean): { cmd: string; args: string[] } {
   if (typeof run === "string") {
      if (shell) return { cmd: "sh", args: ["-c", run] };
      const [cmd = "", ...args] = run.trim().split(/\s+/);
      return { cmd, args };
   }
   if (shell) return { cmd: "sh", args: ["-c", run.map(quote).join(" ")] };
   const [cmd = "", ...args] = run;
   return { cmd, args };
}

// ---------------- utils ----------------

function resolveCwd(root: string, p: string) {
   if (!p) return root;
   return path.isAbsolute(p) ? p : path.resolve(root, p);
}

function rel(root: string, p: string) {
   return path.relative(root, p) || ".";
}

// Token interpolation: {{webRoot}}, {{domain}}, {{backup}}, {{config}}
export function interpolate(s: string, ctx: HookContext): string {
   return s
      .replace(/\{\{\s*webRoot\s*\}\}/g, ctx.webRoot)
      .replace(/\{\{\s*domain\s*\}\}/g, ctx.domain)
      .replace(/\{\{\s*backup\s*\}\}/g, ctx.backup ?? "")
      .replace(/\{\{\s*config\s*\}\}/g, ctx.configPath ?? "");
}

export function buildEnv(ctx: HookContext): Record<string, string> {
   return {
      PANELOPS_WEB_ROOT: ctx.webRoot,
      PANELOPS_DOMAIN: ctx.domain,
      PANELOPS_BACKUP: ctx.backup ?? "",
      PANELOPS_CONFIG: ctx.configPath ?? "",
   };
}
