import { spawn } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pc from "picocolors";
import { CommandError, CommandTimeoutError } from "./errors.js";
import { quote } from "./utils.js";

export type RunOptions = {
   cwd?: string;
   /** Extra variables layered over process.env */
   env?: Record<string, string>;
   /** Run through `sudo -u <user> -H` unless we already are that user */
   asUser?: string;
   /** 0 or omitted means no limit */
   timeoutMs?: number;
   /** Written to stdin, then stdin is closed */
   input?: string;
   /** Resolve with the exit code instead of throwing */
   allowFailure?: boolean;
   /** Probes that only read state; a dry-run runner still executes them */
   readOnly?: boolean;
};

export type RunResult = {
   code: number;
   stdout: string;
   stderr: string;
   timedOut: boolean;
};

export interface CommandRunner {
   run(cmd: string, args?: string[], opts?: RunOptions): Promise<RunResult>;
   /** Absolute path of an executable on PATH, or null */
   which(cmd: string): Promise<string | null>;
}

export function display(cmd: string, args: string[]): string {
   return [cmd, ...args].map(quote).join(" ");
}

/** How a call appears in traces and the run log; env values and stdin are never shown. */
export function traceLine(cmd: string, args: string[], opts: Pick<RunOptions, "asUser"> = {}): string {
   return `${display(cmd, args)}${opts.asUser ? ` (as ${opts.asUser})` : ""}`;
}

export function currentUser(): string {
   try { return os.userInfo().username; } catch { return process.env.USER ?? ""; }
}

/** argv actually spawned for a call, after the sudo wrapper is applied. */
export function buildArgv(cmd: string, args: string[], opts: Pick<RunOptions, "asUser" | "env">, me = currentUser()): [string, string[]] {
   if (!opts.asUser || opts.asUser === me) return [cmd, args];
   const keep = Object.keys(opts.env ?? {});
   return ["sudo", [
      "-u", opts.asUser, "-H",
      ...(keep.length ? [`--preserve-env=${keep.join(",")}`] : []),
      "--", cmd, ...args,
   ]];
}

export class SystemRunner implements CommandRunner {
   /** `trace` receives every state-changing command line before it runs */
   constructor(private readonly trace?: (line: string) => void) { }

   run(cmd: string, args: string[] = [], opts: RunOptions = {}): Promise<RunResult> {
      const [bin, argv] = buildArgv(cmd, args, opts);
      const shown = display(cmd, args);
      if (!opts.readOnly) this.trace?.(`$ ${traceLine(cmd, args, opts)}`);

      return new Promise<RunResult>((resolve, reject) => {
         const child = spawn(bin, argv, {
            cwd: opts.cwd,
            env: { ...process.env, ...(opts.env ?? {}) },
            stdio: ["pipe", "pipe", "pipe"],
         });

         let stdout = "";
         let stderr = "";
         let timedOut = false;
         let timer: NodeJS.Timeout | undefined;

         child.stdout.on("data", (d: Buffer) => { stdout += d.toString(); });
         child.stderr.on("data", (d: Buffer) => { stderr += d.toString(); });

         if (opts.timeoutMs && opts.timeoutMs > 0) {
            timer = setTimeout(() => {
               timedOut = true;
               child.kill("SIGTERM");
            }, opts.timeoutMs);
         }

         child.on("error", (err) => {
            if (timer) clearTimeout(timer);
            if (opts.allowFailure) {
               resolve({ code: 127, stdout, stderr: stderr || err.message, timedOut });
               return;
            }
            reject(new CommandError(shown, 127, err.message, stdout));
         });

         child.on("close", (code) => {
            if (timer) clearTimeout(timer);
            const result: RunResult = { code: code ?? 1, stdout, stderr, timedOut };
            if (timedOut && !opts.allowFailure) {
               reject(new CommandTimeoutError(shown, opts.timeoutMs ?? 0));
               return;
            }
            if (result.code !== 0 && !opts.allowFailure) {
               reject(new CommandError(shown, result.code, stderr, stdout));
               return;
            }
            resolve(result);
         });

         if (opts.input !== undefined) child.stdin.end(opts.input);
         else child.stdin.end();
      });
   }

   async which(cmd: string): Promise<string | null> {
      const dirs = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
      for (const dir of dirs) {
         const full = path.join(dir, cmd);
         try {
            await fs.promises.access(full, fs.constants.X_OK);
            return full;
         } catch {
            continue;
         }
      }
      return null;
   }
}

/**
 * Prints mutating commands instead of running them; read-only probes go through.
 */
export class DryRunRunner implements CommandRunner {
   constructor(
      private readonly inner: CommandRunner,
      private readonly print: (line: string) => void = (l) => console.log(l),
   ) { }

   async run(cmd: string, args: string[] = [], opts: RunOptions = {}): Promise<RunResult> {
      if (opts.readOnly) return this.inner.run(cmd, args, opts);
      this.print(pc.dim(`[dry-run] ${traceLine(cmd, args, opts)}`));
      return { code: 0, stdout: "", stderr: "", timedOut: false };
   }

   which(cmd: string): Promise<string | null> {
      return this.inner.which(cmd);
   }
}

/** True when a call exited 0; a missing binary or failure yields false. */
export async function succeeds(runner: CommandRunner, cmd: string, args: string[] = [], opts: RunOptions = {}): Promise<boolean> {
   const r = await runner.run(cmd, args, { ...opts, allowFailure: true, readOnly: opts.readOnly ?? true });
   return r.code === 0 && !r.timedOut;
}

/** stdout of a read-only probe, trimmed; empty string when it fails. */
export async function capture(runner: CommandRunner, cmd: string, args: string[] = [], opts: RunOptions = {}): Promise<string> {
   const r = await runner.run(cmd, args, { ...opts, allowFailure: true, readOnly: true });
   return r.code === 0 ? r.stdout.trim() : "";
}
