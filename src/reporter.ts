import fs from "node:fs";
import path from "node:path";
import pc from "picocolors";
import type { CheckResult, CheckStatus } from "./types.js";
import { timestamp } from "./utils.js";

export type ReporterOptions = {
   /** Append every line (without colour) to this file */
   logFile?: string;
   /** Where coloured lines go; defaults to console.log */
   write?: (line: string) => void;
   /** Prefix teed lines with wall-clock time (default true) */
   stampLog?: boolean;
};

export type Tally = { pass: number; warn: number; fail: number; info: number };

const ANSI = /\x1b\[[0-9;]*m/g;

export function stripAnsi(s: string): string {
   return s.replace(ANSI, "");
}

export class Reporter {
   readonly logFile?: string;
   private readonly write: (line: string) => void;
   private readonly stampLog: boolean;
   private readonly counts: Tally = { pass: 0, warn: 0, fail: 0, info: 0 };
   private stepNo = 0;

   constructor(opts: ReporterOptions = {}) {
      this.logFile = opts.logFile;
      this.write = opts.write ?? ((line) => console.log(line));
      this.stampLog = opts.stampLog ?? true;
      if (this.logFile) {
         fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
         fs.appendFileSync(this.logFile, `# panelops run log\nStarted: ${new Date().toString()}\n${"=".repeat(41)}\n`);
      }
   }

   banner(title: string, lines: string[] = []) {
      const rule = "=".repeat(Math.max(title.length, 30));
      this.emit("");
      this.emit(pc.bold(title));
      this.emit(rule);
      for (const l of lines) this.emit(l);
      this.emit(rule);
      this.emit("");
   }

   step(title: string) {
      this.stepNo++;
      this.emit(pc.green(pc.bold(`Step ${this.stepNo}: ${title}`)));
   }

   section(title: string) {
      this.emit("");
      this.emit(pc.magenta(`🔍 ${title}`));
   }

   log(msg: string) { this.emit(pc.green(`✅ ${msg}`)); }
   warn(msg: string) { this.emit(pc.yellow(`⚠️ ${msg}`)); }
   error(msg: string) { this.emit(pc.red(`❌ ${msg}`)); }
   info(msg: string) { this.emit(pc.blue(`ℹ️ ${msg}`)); }
   dim(msg: string) { this.emit(pc.dim(msg)); }
   plain(msg = "") { this.emit(msg); }

   /** Record a check outcome and print it with the matching colour. */
   check(result: CheckResult): CheckResult {
      this.counts[result.status]++;
      const text = result.detail ? `${result.name}: ${result.detail}` : result.name;
      const line = `${statusSymbol(result.status)} ${text}`;
      switch (result.status) {
         case "pass": this.emit(pc.green(line)); break;
         case "warn": this.emit(pc.yellow(line)); break;
         case "fail": this.emit(pc.red(line)); break;
         case "info": this.emit(pc.blue(line)); break;
      }
      return result;
   }

   pass(name: string, detail?: string) { return this.check({ name, status: "pass", detail }); }
   warnCheck(name: string, detail?: string) { return this.check({ name, status: "warn", detail }); }
   fail(name: string, detail?: string) { return this.check({ name, status: "fail", detail }); }
   note(name: string, detail?: string) { return this.check({ name, status: "info", detail }); }

   tally(): Tally {
      return { ...this.counts };
   }

   /** Write raw text (command output, log excerpts) to the run log only. */
   attach(label: string, body: string) {
      if (!this.logFile) return;
      const indented = body.trimEnd().split(/\r?\n/).map((l) => `    ${l}`).join("\n");
      fs.appendFileSync(this.logFile, `=== ${label} ===\n${indented}\n\n`);
   }

   private emit(line: string) {
      this.write(line);
      if (!this.logFile) return;
      const clean = stripAnsi(line);
      const prefix = this.stampLog && clean ? `[${new Date().toISOString()}] ` : "";
      fs.appendFileSync(this.logFile, `${prefix}${clean}\n`);
   }
}

/** Counts recorded after `start` was taken */
export function tallySince(start: Tally, now: Tally): Tally {
   return { pass: now.pass - start.pass, warn: now.warn - start.warn, fail: now.fail - start.fail, info: now.info - start.info };
}

export function statusSymbol(status: CheckStatus): string {
   return status === "pass" ? "✓" : status === "fail" ? "✗" : status === "warn" ? "⚠" : "•";
}

export function runLogPath(logDir: string, command: string, now: Date = new Date()): string {
   const slug = command.replace(/[^a-z0-9]+/gi, "-").replace(/^-|-$/g, "").toLowerCase();
   return path.join(logDir, `panelops-${slug}-${timestamp(now)}.log`);
}
