import path from "node:path";
import type { OpsContext } from "./context.js";
import { OpsError } from "./errors.js";
import { handleCheck } from "./handle-check.js";
import { handleDeploy, type DeployOptions } from "./handle-deploy.js";
import { handleRollback } from "./handle-rollback.js";
import { handleVerify } from "./handle-verify.js";
import { confirmOrAbort } from "./prompt.js";

export type PipelineResult = {
   ok: boolean;
   backup?: string;
   rolledBack: boolean;
};

/**
 * check, deploy, verify. A failed verification is only rolled back when an
 * operator at the terminal asks for it.
 */
export async function handlePipeline(ctx: OpsContext, deployOpts: DeployOptions = {}): Promise<PipelineResult> {
   const { cfg, reporter, prompter } = ctx;

   reporter.banner("Deployment pipeline", [
      "1. Pre-deployment check",
      "2. Deploy",
      "3. Post-deployment verification",
      `Domain: ${cfg.domain}`,
   ]);
   await confirmOrAbort(prompter, "Start the pipeline?", cfg.confirm, ctx.yes);
   // one confirmation covers every stage
   const inner: OpsContext = { ...ctx, yes: true };

   const check = await handleCheck(inner, { askMysqlPassword: false });
   if (!check.ready) {
      throw OpsError.stepFailed("Pre-deployment check", `${check.tally.fail} check(s) failed`);
   }

   const deploy = await handleDeploy(inner, deployOpts);
   if (!deploy.ok) reporter.warn("Deploy finished with failed steps; verifying anyway");

   const verify = await handleVerify(inner);
   let rolledBack = false;
   let ok = deploy.ok && verify.ok;

   if (!verify.ok && prompter.interactive) {
      const carryOn = await prompter.confirm("Verification failed. Continue anyway?");
      if (carryOn) {
         ok = true;
      } else if (deploy.backup && (await prompter.confirm(`Roll back to ${path.basename(deploy.backup)}?`))) {
         const rb = await handleRollback(inner, { backup: deploy.backup, env: deployOpts.env });
         rolledBack = true;
         ok = false;
         if (!rb.ok) reporter.error("Rollback finished with failed steps");
      }
   }

   printInstructions(ctx, deploy.backup, rolledBack);
   return { ok, backup: deploy.backup, rolledBack };
}

function printInstructions(ctx: OpsContext, backup: string | undefined, rolledBack: boolean) {
   const { cfg, reporter } = ctx;
   reporter.section("Next");
   reporter.plain(`  Site:        https://${cfg.domain}`);
   reporter.plain(`  Web root:    ${cfg.webRoot}`);
   reporter.plain(`  Environment: ${path.join(cfg.webRoot, ".env")}`);
   reporter.plain(`  Credentials: ${path.join(cfg.mysql.credentialsDir, `${cfg.mysql.database}_credentials.txt`)}`);
   reporter.plain(`  Laravel log: ${path.join(cfg.webRoot, "storage/logs/laravel.log")}`);
   if (reporter.logFile) reporter.plain(`  Run log:     ${reporter.logFile}`);
   if (backup && !rolledBack) reporter.plain(`  Roll back:   sudo panelops rollback --backup ${path.basename(backup)}`);
}
