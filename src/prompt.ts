import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";
import pc from "picocolors";
import { OpsError } from "./errors.js";
import type { ConfirmMode } from "./types.js";

export type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
export type PromptOutput = NodeJS.WritableStream & { isTTY?: boolean };

export interface Prompter {
   readonly interactive: boolean;
   confirm(question: string): Promise<boolean>;
   /** Input is not echoed */
   secret(question: string): Promise<string>;
   select(title: string, items: string[]): Promise<number>;
}

export class TerminalPrompter implements Prompter {
   readonly interactive: boolean;

   constructor(
      private readonly input: PromptInput = process.stdin,
      private readonly output: PromptOutput = process.stdout,
   ) {
      this.interactive = Boolean(input.isTTY && output.isTTY);
   }

   async confirm(question: string): Promise<boolean> {
      const ans = await this.ask(`${question} (y/N): `);
      return /^(y|yes)$/i.test(ans.trim());
   }

   async secret(question: string): Promise<string> {
      let muted = false;
      const out = this.output;
      const sink = new Writable({
         write(chunk: Buffer | string, _enc, cb) {
            if (!muted) out.write(chunk);
            cb();
         },
      });
      const rl = createInterface({ input: this.input, output: sink, terminal: true });
      try {
         out.write(`${question}: `);
         muted = true;
         return await rl.question("");
      } catch (e) {
         throw asAbort(e);
      } finally {
         muted = false;
         out.write("\n");
         rl.close();
      }
   }

   /** Minimal arrow-key selector without extra deps */
   select(title: string, items: string[]): Promise<number> {
      if (!items.length) return Promise.reject(new OpsError("ABORTED", "No items to select."));
      const stdin = this.input;
      const stdout = this.output;

      function render(idx: number, initial = false) {
         if (!initial) stdout.write(`\x1b[${items.length + 2}A`);
         stdout.write(pc.bold(title) + "\n");
         stdout.write(pc.dim("Use ↑/↓ and Enter") + "\n");
         for (let i = 0; i < items.length; i++) {
            const line = (i === idx ? pc.cyan("> ") : "  ") + items[i];
            stdout.write(line + "\x1b[K\n");
         }
      }

      return new Promise<number>((resolve, reject) => {
         let index = 0;
         if (stdin.isTTY) stdin.setRawMode?.(true);
         stdin.resume();
         stdin.setEncoding("utf8");

         render(index, true);

         function onData(key: string) {
            if (key === "\u0003") { // Ctrl-C
               cleanup();
               reject(OpsError.aborted());
               return;
            }
            if (key === "\r" || key === "\n") {
               cleanup();
               resolve(index);
               return;
            }
            if (key === "\u001b[A") {
               index = (index - 1 + items.length) % items.length;
               render(index);
            } else if (key === "\u001b[B") {
               index = (index + 1) % items.length;
               render(index);
            }
         }

         function cleanup() {
            stdin.off("data", onData);
            if (stdin.isTTY) stdin.setRawMode?.(false);
            stdin.pause();
            stdout.write("\n");
         }

         stdin.on("data", onData);
      });
   }

   private async ask(prompt: string): Promise<string> {
      const rl = createInterface({ input: this.input, output: this.output });
      try {
         return await rl.question(prompt);
      } catch (e) {
         throw asAbort(e);
      } finally {
         rl.close();
      }
   }
}

/** readline rejects a question with AbortError on Ctrl-C */
function asAbort(e: unknown): unknown {
   return e instanceof Error && e.name === "AbortError" ? OpsError.aborted() : e;
}

/**
 * Gate a destructive action.
 *  - never: proceed silently
 *  - always: ask whenever a terminal is attached, even with --yes
 *  - auto: --yes skips the question; otherwise ask
 * A session without a terminal must pass --yes.
 */
export async function confirmOrAbort(prompter: Prompter, question: string, mode: ConfirmMode, yes: boolean): Promise<void> {
   if (mode === "never") return;
   if (mode === "auto" && yes) return;
   if (!prompter.interactive) {
      if (yes) return;
      throw new OpsError("ABORTED", "Non-interactive session. Pass --yes to proceed.");
   }
   const ok = await prompter.confirm(question);
   if (!ok) throw OpsError.cancelled();
}
