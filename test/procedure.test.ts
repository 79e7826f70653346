import { describe, expect, it } from "vitest";
import { OpsError } from "../src/errors.js";
import { Perf } from "../src/perf.js";
import { runProcedure, type Procedure } from "../src/procedure.js";
import { Reporter } from "../src/reporter.js";

function quietReporter() {
   const lines: string[] = [];
   return { reporter: new Reporter({ write: (l) => lines.push(l) }), lines };
}

function proc(order: string[], failAt: string, critical = false): Procedure<string[]> {
   const step = (title: string) => ({
      title,
      critical: critical && title === failAt,
      run(log: string[]) {
         log.push(title);
         if (title === failAt) throw new Error(`${title} broke`);
         return title === "c" ? "skipped" : `${title} done`;
      },
   });
   return { title: "Test", steps: order.map(step) };
}

describe("runProcedure", () => {
   it("records every step when nothing fails", async () => {
      const log: string[] = [];
      const result = await runProcedure(proc(["a", "b", "c"], "none"), log, { ...quietReporter(), policy: "abort" });
      expect(log).toEqual(["a", "b", "c"]);
      expect(result.ok).toBe(true);
      expect(result.outcomes.map((o) => [o.title, o.status, o.detail])).toEqual([
         ["a", "ok", "a done"],
         ["b", "ok", "b done"],
         ["c", "skipped", undefined],
      ]);
   });

   it("stops at the first failure under the abort policy", async () => {
      const log: string[] = [];
      await expect(runProcedure(proc(["a", "b", "c"], "b"), log, { ...quietReporter(), policy: "abort" }))
         .rejects.toMatchObject({ code: "STEP_FAILED", message: "b: b broke" });
      expect(log).toEqual(["a", "b"]);
   });

   it("carries on under the continue policy", async () => {
      const log: string[] = [];
      const result = await runProcedure(proc(["a", "b", "c"], "a"), log, { ...quietReporter(), policy: "continue" });
      expect(log).toEqual(["a", "b", "c"]);
      expect(result.ok).toBe(false);
      expect(result.outcomes[0]).toMatchObject({ status: "failed", detail: "a broke" });
   });

   it("stops on a critical step even when continuing", async () => {
      const log: string[] = [];
      await expect(runProcedure(proc(["a", "b", "c"], "a", true), log, { ...quietReporter(), policy: "continue" }))
         .rejects.toBeInstanceOf(OpsError);
      expect(log).toEqual(["a"]);
   });

   it("passes a user abort through unchanged", async () => {
      const aborted = OpsError.aborted();
      const p: Procedure<null> = { title: "T", steps: [{ title: "x", run: () => { throw aborted; } }, { title: "y", run: () => undefined }] };
      await expect(runProcedure(p, null, { ...quietReporter(), policy: "continue" })).rejects.toBe(aborted);
   });

   it("numbers steps and prints a summary", async () => {
      const { reporter, lines } = quietReporter();
      await runProcedure(proc(["a", "b"], "none"), [], { reporter, policy: "abort" });
      const plain = lines.map((l) => l.replace(/\x1b\[[0-9;]*m/g, ""));
      expect(plain).toContain("Step 1: a");
      expect(plain).toContain("Step 2: b");
      expect(plain).toContain("🔍 Test: summary");
      expect(plain[plain.length - 1]).toBe("✅ Test completed");
   });
});

describe("Perf", () => {
   it("times each step when enabled", async () => {
      const printed: string[] = [];
      const perf = new Perf(true, (l) => printed.push(l));
      await runProcedure(proc(["a", "b"], "none"), [], { ...quietReporter(), policy: "abort", perf });
      expect(perf.entries().map((t) => t.label)).toEqual(["a", "b"]);
      perf.done();
      expect(printed).toHaveLength(4);
   });

   it("records nothing when disabled", () => {
      const printed: string[] = [];
      const perf = new Perf(false, (l) => printed.push(l));
      perf.record("a", 10);
      expect(perf.done()).toBeGreaterThanOrEqual(0);
      expect(perf.entries()).toEqual([]);
      expect(printed).toEqual([]);
   });
});
