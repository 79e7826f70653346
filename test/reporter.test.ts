import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { Reporter, runLogPath, stripAnsi, tallySince } from "../src/reporter.js";
import { tmpDir } from "./helpers.js";

describe("Reporter", () => {
   it("counts check outcomes", () => {
      const lines: string[] = [];
      const r = new Reporter({ write: (l) => lines.push(stripAnsi(l)) });
      r.pass("PHP", "8.3.6");
      r.warnCheck("Disk", "4 GB free");
      r.fail("Composer");
      const start = r.tally();
      r.note("Panel", "plain");
      r.fail("nginx");
      expect(lines).toEqual(["✓ PHP: 8.3.6", "⚠ Disk: 4 GB free", "✗ Composer", "• Panel: plain", "✗ nginx"]);
      expect(r.tally()).toEqual({ pass: 1, warn: 1, fail: 2, info: 1 });
      expect(tallySince(start, r.tally())).toEqual({ pass: 0, warn: 0, fail: 1, info: 1 });
   });

   it("tees plain lines and attachments into the run log", async () => {
      const file = path.join(await tmpDir(), "logs", "run.log");
      const r = new Reporter({ logFile: file, write: () => undefined, stampLog: false });
      r.error("nginx -t failed");
      r.attach("nginx -t", "line one\nline two\n");
      const text = await fs.promises.readFile(file, "utf8");
      const body = text.split("\n").slice(3).join("\n");
      expect(text.startsWith("# panelops run log\nStarted: ")).toBe(true);
      expect(body).toBe("❌ nginx -t failed\n=== nginx -t ===\n    line one\n    line two\n\n");
   });

   it("skips attachments without a log file", () => {
      const lines: string[] = [];
      new Reporter({ write: (l) => lines.push(l) }).attach("x", "y");
      expect(lines).toEqual([]);
   });
});

it("names run logs by command and time", () => {
   expect(runLogPath("/var/log/panelops", "fix-nginx-binding", new Date(2026, 4, 6, 7, 8, 9)))
      .toBe("/var/log/panelops/panelops-fix-nginx-binding-20260506_070809.log");
});
