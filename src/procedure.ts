import pc from "picocolors";
import { OpsError } from "./errors.js";
import type { Perf } from "./perf.js";
import type { Reporter } from "./reporter.js";
import type { ErrorPolicy } from "./types.js";
import { errorMessage } from "./utils.js";

/** A step may report "skipped" or a short detail line; throwing marks it failed. */
export type StepReturn = string | void;

export type Step<C> = {
   title: string;
   /** Aborts the procedure even under the continue policy */
   critical?: boolean;
   run(ctx: C): Promise<StepReturn> | StepReturn;
};

export type Procedure<C> = {
   title: string;
   steps: Step<C>[];
};

export type StepStatus = "ok" | "failed" | "skipped";

export type StepOutcome = {
   title: string;
   status: StepStatus;
   detail?: string;
   durationMs: number;
};

export type ProcedureResult = {
   title: string;
   outcomes: StepOutcome[];
   ok: boolean;
};

export type RunProcedureOptions = {
   reporter: Reporter;
   policy: ErrorPolicy;
   perf?: Perf;
};

export async function runProcedure<C>(proc: Procedure<C>, ctx: C, opts: RunProcedureOptions): Promise<ProcedureResult> {
   const { reporter, policy, perf } = opts;
   const outcomes: StepOutcome[] = [];

   for (const step of proc.steps) {
      reporter.step(step.title);
      const t0 = Date.now();
      try {
         const ret = await step.run(ctx);
         const durationMs = Date.now() - t0;
         if (ret === "skipped") {
            reporter.dim("   skipped");
            outcomes.push({ title: step.title, status: "skipped", durationMs });
         } else {
            outcomes.push({ title: step.title, status: "ok", detail: ret || undefined, durationMs });
         }
      } catch (e) {
         const durationMs = Date.now() - t0;
         outcomes.push({ title: step.title, status: "failed", detail: errorMessage(e), durationMs });
         reporter.error(`${step.title} failed: ${errorMessage(e)}`);

         // A user abort ends everything regardless of policy
         const userAbort = e instanceof OpsError && e.code === "ABORTED";
         if (userAbort || policy === "abort" || step.critical) {
            const result = { title: proc.title, outcomes, ok: false };
            printSummary(reporter, result);
            if (userAbort) throw e;
            throw OpsError.stepFailed(step.title, e);
         }
         reporter.warn("Continuing (error policy: continue)");
      } finally {
         perf?.record(step.title, Date.now() - t0);
      }
   }

   const result = { title: proc.title, outcomes, ok: outcomes.every((o) => o.status !== "failed") };
   printSummary(reporter, result);
   return result;
}

export function printSummary(reporter: Reporter, result: ProcedureResult) {
   reporter.section(`${result.title}: summary`);
   for (const o of result.outcomes) {
      const secs = (o.durationMs / 1000).toFixed(1);
      const line = `${o.title} (${secs}s)${o.detail ? ` ${pc.dim("- " + o.detail)}` : ""}`;
      if (o.status === "ok") reporter.plain(pc.green(`  ✓ ${line}`));
      else if (o.status === "skipped") reporter.plain(pc.dim(`  - ${line}`));
      else reporter.plain(pc.red(`  ✗ ${line}`));
   }
   const failed = result.outcomes.filter((o) => o.status === "failed").length;
   if (failed) reporter.warn(`${failed} step(s) failed`);
   else reporter.log(`${result.title} completed`);
}
