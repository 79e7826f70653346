import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveConfig } from "../src/config.js";
import type { NetworkProbes, OpsContext } from "../src/context.js";
import { CommandError } from "../src/errors.js";
import { traceLine, type CommandRunner, type RunOptions, type RunResult } from "../src/exec.js";
import type { ProbeOptions, ProbeResult } from "../src/http-probe.js";
import type { Prompter } from "../src/prompt.js";
import { Reporter, stripAnsi } from "../src/reporter.js";
import type { CertInfo } from "../src/tls.js";

export type Call = { cmd: string; args: string[]; opts: RunOptions; line: string };

type Reply = Partial<RunResult> | ((call: Call) => Partial<RunResult>);

/**
 * In-process CommandRunner. Calls succeed with empty output unless a rule
 * matches; the most recently added matching rule wins.
 */
export class FakeRunner implements CommandRunner {
   readonly calls: Call[] = [];
   /** Receives state-changing command lines, as SystemRunner's trace does */
   trace?: (line: string) => void;
   private readonly rules: { match: (c: Call) => boolean; reply: Reply }[] = [];

   constructor(private readonly available: string[] = ["php", "composer", "npm", "node", "mysql", "nginx", "ufw"]) { }

   /** A string matches when the command line starts with it. */
   on(pattern: string | RegExp, reply: Reply): this {
      const match = typeof pattern === "string"
         ? (c: Call) => c.line === pattern || c.line.startsWith(`${pattern} `)
         : (c: Call) => pattern.test(c.line);
      this.rules.push({ match, reply });
      return this;
   }

   async run(cmd: string, args: string[] = [], opts: RunOptions = {}): Promise<RunResult> {
      const call: Call = { cmd, args, opts, line: [cmd, ...args].join(" ") };
      this.calls.push(call);
      if (!opts.readOnly) this.trace?.(`$ ${traceLine(cmd, args, opts)}`);
      const rule = [...this.rules].reverse().find((r) => r.match(call));
      const partial = rule ? (typeof rule.reply === "function" ? rule.reply(call) : rule.reply) : {};
      const result: RunResult = { code: 0, stdout: "", stderr: "", timedOut: false, ...partial };
      if (result.code !== 0 && !opts.allowFailure) throw new CommandError(call.line, result.code, result.stderr, result.stdout);
      return result;
   }

   async which(cmd: string): Promise<string | null> {
      return this.available.includes(cmd) ? `/usr/bin/${cmd}` : null;
   }

   lines(): string[] {
      return this.calls.map((c) => c.line);
   }

   find(prefix: string): Call | undefined {
      return this.calls.find((c) => c.line === prefix || c.line.startsWith(`${prefix} `));
   }
}

/** Answers queued up front; an empty queue answers no, an empty string or 0. */
export class ScriptedPrompter implements Prompter {
   readonly asked: string[] = [];

   constructor(
      readonly interactive: boolean,
      private readonly answers: { confirm?: boolean[]; secret?: string[]; select?: number[] } = {},
   ) { }

   async confirm(question: string): Promise<boolean> {
      this.asked.push(question);
      return this.answers.confirm?.shift() ?? false;
   }

   async secret(question: string): Promise<string> {
      this.asked.push(question);
      return this.answers.secret?.shift() ?? "";
   }

   async select(title: string): Promise<number> {
      this.asked.push(title);
      return this.answers.select?.shift() ?? 0;
   }
}

export function probeResult(url: string, status: number, extra: Partial<ProbeResult> = {}): ProbeResult {
   return { url, status, timeMs: 5, size: 0, headers: {}, bodyPreview: "", ...extra };
}

/** Probes answer from a table keyed by URL; anything else is unreachable. */
export function fakeNet(statuses: Record<string, number | Partial<ProbeResult>>, cert?: CertInfo): NetworkProbes & { probed: string[] } {
   const probed: string[] = [];
   return {
      probed,
      async probe(url: string, _opts?: ProbeOptions) {
         probed.push(url);
         const entry = statuses[url];
         if (entry === undefined) return probeResult(url, 0, { error: "ECONNREFUSED" });
         return typeof entry === "number" ? probeResult(url, entry) : probeResult(url, entry.status ?? 200, entry);
      },
      async remoteCertificate(host: string) {
         if (!cert) throw new Error(`connect ECONNREFUSED ${host}:443`);
         return cert;
      },
   };
}

export async function tmpDir(prefix = "panelops-test-"): Promise<string> {
   return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
   for (const [rel, body] of Object.entries(files)) {
      const full = path.join(root, rel);
      await fs.promises.mkdir(path.dirname(full), { recursive: true });
      await fs.promises.writeFile(full, body);
   }
}

export type TestContext = OpsContext & {
   runner: FakeRunner;
   prompter: ScriptedPrompter;
   /** Console lines without colour */
   output: string[];
};

export function makeContext(opts: {
   raw?: Record<string, unknown>;
   runner?: FakeRunner;
   prompter?: ScriptedPrompter;
   net?: NetworkProbes;
   dryRun?: boolean;
   yes?: boolean;
   /** Tee output to a run log and trace commands into it, as the CLI does */
   logFile?: string;
}): TestContext {
   const cfg = resolveConfig({ domain: "example.test", panel: "plain", requireRoot: false, ...opts.raw }, {}, { env: {}, warn: () => undefined });
   const output: string[] = [];
   const reporter = new Reporter({ write: (l) => output.push(stripAnsi(l)), logFile: opts.logFile });
   const runner = opts.runner ?? new FakeRunner();
   if (opts.logFile) runner.trace = (l) => reporter.dim(l);
   return {
      cfg,
      runner,
      reporter,
      prompter: opts.prompter ?? new ScriptedPrompter(false),
      net: opts.net ?? fakeNet({}),
      dryRun: opts.dryRun ?? false,
      yes: opts.yes ?? true,
      output,
   };
}
