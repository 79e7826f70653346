import pc from "picocolors";

export type Timing = { label: string; ms: number };

/** Step durations, printed as they land and ranked at the end. Off unless PANELOPS_TIMING=1. */
export class Perf {
   private readonly t0 = Date.now();
   private readonly timings: Timing[] = [];

   constructor(
      readonly enabled = process.env.PANELOPS_TIMING === "1",
      private readonly print: (line: string) => void = console.log,
   ) { }

   record(label: string, ms: number): void {
      if (!this.enabled) return;
      this.timings.push({ label, ms });
      this.print(pc.dim(`[timing] ${label}: ${ms}ms`));
   }

   entries(): Timing[] {
      return [...this.timings];
   }

   /** Print the slowest steps and the wall time since construction. */
   done(top = 3): number {
      const total = Date.now() - this.t0;
      if (!this.enabled) return total;
      const slowest = [...this.timings].sort((a, b) => b.ms - a.ms).slice(0, top);
      if (slowest.length) this.print(pc.dim(`[timing] slowest: ${slowest.map((t) => `${t.label} ${t.ms}ms`).join(", ")}`));
      this.print(pc.dim(`[timing] total: ${total}ms`));
      return total;
   }
}
