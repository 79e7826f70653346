import path from "node:path";
import { capture, succeeds } from "./exec.js";
import type { OpsContext } from "./context.js";
import { Php, installHint, missingExtensions, versionAtLeast } from "./php.js";
import { Services } from "./services.js";
import { freeDiskGb, systemInfo } from "./system-info.js";
import type { CheckStatus } from "./types.js";
import { humanSize } from "./utils.js";

/** Host facts printed at the top of check and diagnose */
export async function reportSystem(ctx: Pick<OpsContext, "reporter">, diskPath = "/"): Promise<number | null> {
   const { reporter } = ctx;
   const s = systemInfo();
   reporter.note("OS", `${s.os} (${s.arch}, kernel ${s.kernel})`);
   reporter.note("Host", s.hostname);
   reporter.note("CPU", `${s.cpus} core(s), load ${s.loadAvg.map((l) => l.toFixed(2)).join(" ")}`);
   reporter.note("Memory", `${humanSize(s.memFreeMb * 1024 ** 2)} free of ${humanSize(s.memTotalMb * 1024 ** 2)}`);
   reporter.note("Uptime", `${s.uptimeHours}h`);
   try {
      const gb = await freeDiskGb(diskPath);
      reporter.note("Disk", `${gb} GB free on ${diskPath}`);
      return gb;
   } catch {
      return null;
   }
}

/**
 * PHP present, new enough, with every required extension.
 * Returns the version when PHP runs at all.
 */
export async function checkPhp(ctx: Pick<OpsContext, "cfg" | "runner" | "reporter">): Promise<string | null> {
   const { cfg, reporter } = ctx;
   const php = new Php(ctx.runner);
   const version = await php.version();
   if (!version) {
      reporter.fail("PHP", "not installed or not runnable");
      return null;
   }
   if (versionAtLeast(version, cfg.php.minVersion)) reporter.pass("PHP version", version);
   else reporter.fail("PHP version", `${version} (need >= ${cfg.php.minVersion})`);

   const missing = missingExtensions(cfg.php.extensions, await php.modules());
   if (missing.length) reporter.fail("PHP extensions", `missing ${missing.join(", ")} - ${installHint(missing, version)}`);
   else reporter.pass("PHP extensions", `${cfg.php.extensions.length} required present`);
   return version;
}

/** Binary on PATH, with its version line as detail */
export async function checkTool(
   ctx: Pick<OpsContext, "runner" | "reporter">,
   label: string,
   bin: string,
   versionArgs: string[],
   missing: CheckStatus = "fail",
): Promise<boolean> {
   if ((await ctx.runner.which(bin)) === null) {
      ctx.reporter.check({ name: label, status: missing, detail: "not installed" });
      return false;
   }
   const v = await capture(ctx.runner, bin, versionArgs, { env: { COMPOSER_ALLOW_SUPERUSER: "1" } });
   ctx.reporter.pass(label, v.split(/\r?\n/)[0] || "installed");
   return true;
}

export type ServiceCheck = { inactive: CheckStatus; disabled?: CheckStatus };

/** Report one unit's running and boot state; returns whether it is active. */
export async function checkService(ctx: Pick<OpsContext, "runner" | "reporter">, name: string, label: string, how: ServiceCheck): Promise<boolean> {
   const st = await new Services(ctx.runner).state(name);
   if (st.active) ctx.reporter.pass(`${label} running`, name);
   else ctx.reporter.check({ name: `${label} running`, status: how.inactive, detail: `${name} is not active` });
   if (how.disabled) {
      if (st.enabled) ctx.reporter.pass(`${label} enabled at boot`);
      else ctx.reporter.check({ name: `${label} enabled at boot`, status: how.disabled, detail: `systemctl enable ${name}` });
   }
   return st.active;
}

/** Writability as the site owner sees it, not as root */
export async function checkWritableDirs(ctx: Pick<OpsContext, "cfg" | "runner" | "reporter">, dirs: string[], failAs: CheckStatus): Promise<boolean> {
   let ok = true;
   for (const d of dirs) {
      const full = path.join(ctx.cfg.webRoot, d);
      if (await succeeds(ctx.runner, "test", ["-w", full], { asUser: ctx.cfg.webUser })) ctx.reporter.pass(`${d} writable`);
      else {
         ok = false;
         ctx.reporter.check({ name: `${d} writable`, status: failAs, detail: full });
      }
   }
   return ok;
}
