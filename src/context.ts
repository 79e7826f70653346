import fs from "node:fs";
import path from "node:path";
import { OpsError } from "./errors.js";
import { capture, type CommandRunner } from "./exec.js";
import { probe, type ProbeFn } from "./http-probe.js";
import type { Perf } from "./perf.js";
import { Php, fpmServiceName } from "./php.js";
import type { Prompter } from "./prompt.js";
import type { Reporter } from "./reporter.js";
import { Services } from "./services.js";
import { remoteCertificate } from "./tls.js";
import type { ResolvedConfig } from "./types.js";

/** Network access, swappable so commands can be exercised offline */
export type NetworkProbes = {
   probe: ProbeFn;
   remoteCertificate: typeof remoteCertificate;
};

export const liveNetwork: NetworkProbes = { probe, remoteCertificate };

/** Everything a command handler needs, built once by the CLI. */
export type OpsContext = {
   cfg: ResolvedConfig;
   configPath?: string;
   runner: CommandRunner;
   reporter: Reporter;
   prompter: Prompter;
   net: NetworkProbes;
   perf?: Perf;
   dryRun: boolean;
   yes: boolean;
};

/**
 * Mutating commands need root for chown, systemctl and /etc/nginx. A dry run
 * only prints, so it is let through.
 */
export function requireRoot(ctx: Pick<OpsContext, "cfg" | "dryRun">, command: string, uid: number | undefined = process.getuid?.()): void {
   if (!ctx.cfg.requireRoot || ctx.dryRun) return;
   if (uid !== 0) throw OpsError.notRoot(command);
}

/** Every binary must be on PATH; throws for the first one missing. */
export async function requireCommands(runner: CommandRunner, names: string[]): Promise<void> {
   for (const n of names) {
      if ((await runner.which(n)) === null) throw OpsError.prerequisiteMissing(n);
   }
}

/** Skip a filesystem change under --dry-run, printing what would have happened. */
export async function act(ctx: Pick<OpsContext, "dryRun" | "reporter">, description: string, fn: () => Promise<void>): Promise<boolean> {
   if (ctx.dryRun) {
      ctx.reporter.dim(`[dry-run] would ${description}`);
      return false;
   }
   await fn();
   return true;
}

export type FpmInfo = { version?: string; service: string; socket: string };

/**
 * PHP-FPM wiring: configured values first, otherwise the running unit among
 * php<ver>-fpm and php-fpm, with the socket derived from the CLI version.
 */
export async function detectFpm(ctx: Pick<OpsContext, "cfg" | "runner">): Promise<FpmInfo> {
   const php = new Php(ctx.runner);
   const version = ctx.cfg.php.version ?? (await php.version()) ?? undefined;
   const socket = php.detectSocket(version, ctx.cfg.php.fpmSocket);
   if (ctx.cfg.php.fpmService) return { version, service: ctx.cfg.php.fpmService, socket };
   const candidates = [...new Set([fpmServiceName(version), "php-fpm"])];
   const active = await new Services(ctx.runner).firstActive(candidates);
   return { version, service: active ?? candidates[0] ?? "php-fpm", socket };
}

/** "user:group" owning a path, via stat(1) so names resolve the way the host sees them */
export async function ownerOf(runner: CommandRunner, p: string): Promise<string> {
   return capture(runner, "stat", ["-c", "%U:%G", p]);
}

/** First address from `hostname -I`, or the configured one */
export async function serverIp(ctx: Pick<OpsContext, "cfg" | "runner">): Promise<string | undefined> {
   if (ctx.cfg.nginx.serverIp) return ctx.cfg.nginx.serverIp;
   const out = await capture(ctx.runner, "hostname", ["-I"]);
   return out.split(/\s+/).find(Boolean);
}

/** Last `n` lines of a text file; empty when unreadable */
export async function tailFile(file: string, n = 20): Promise<string[]> {
   try {
      const text = await fs.promises.readFile(file, "utf8");
      return text.split(/\r?\n/).filter(Boolean).slice(-n);
   } catch {
      return [];
   }
}

export function publicDir(cfg: ResolvedConfig): string {
   return path.join(cfg.webRoot, "public");
}
