import fs from "node:fs";
import path from "node:path";
import { detectFpm, publicDir, requireCommands, requireRoot, serverIp, type OpsContext } from "./context.js";
import { OpsError } from "./errors.js";
import { classify, statusCode, type ProbeResult } from "./http-probe.js";
import { Nginx, backupConfig, findIpBoundListeners, renderBindingConfig, restoreConfig, rewriteIpBoundListen, type BindingKind } from "./nginx.js";
import { detectFastPanel } from "./system-info.js";

export type FixNginxOptions = {
   /** Rewrite IP-bound listens in place instead of adding a binding block */
   rewrite?: boolean;
   /** Binding block answers on every address (`listen 80`, `server_name _`) */
   universal?: boolean;
};

export type FixNginxResult = {
   ok: boolean;
   probes: ProbeResult[];
   rewritten: string[];
   bindingFile?: string;
};

/** An HTTP answer of any kind except 4xx proves nginx is reachable on that address. */
export function connects(status: number): boolean {
   const c = classify(status);
   return c === "ok" || c === "server-error";
}

export async function handleFixNginx(ctx: OpsContext, opts: FixNginxOptions = {}): Promise<FixNginxResult> {
   const { cfg, reporter, runner } = ctx;
   requireRoot(ctx, "fix nginx-binding");
   await requireCommands(runner, ["nginx"]);
   const nginx = new Nginx(runner, cfg.nginx);

   reporter.section("Panel");
   const marker = detectFastPanel();
   if (marker) reporter.note("FastPanel", `detected (${marker})`);
   else reporter.note("FastPanel", "not detected");

   reporter.section("Listen directives");
   const listens = await nginx.listeners(await nginx.scanConfigs());
   for (const l of listens) reporter.dim(`  ${l.file}:${l.line}  ${l.raw}`);
   const ipBound = findIpBoundListeners(listens);
   if (ipBound.length) {
      for (const l of ipBound) reporter.warn(`Bound to ${l.address}:${l.port} only: ${l.file}:${l.line}`);
   } else {
      reporter.log("No listeners bound to a single public IP");
   }

   const rewritten: string[] = [];
   let bindingFile: string | undefined;

   if (opts.rewrite) {
      reporter.section("Rewrite IP-bound listens");
      const files = [...new Set(ipBound.map((l) => l.file))];
      const saved: { file: string; backup: string }[] = [];
      for (const file of files) {
         const { text, rewrites } = rewriteIpBoundListen(await fs.promises.readFile(file, "utf8"));
         if (!rewrites) continue;
         if (ctx.dryRun) {
            reporter.dim(`[dry-run] would rewrite ${rewrites} listen(s) in ${file}`);
            continue;
         }
         saved.push({ file, backup: await backupConfig(file) });
         await fs.promises.writeFile(file, text);
         rewritten.push(file);
         reporter.log(`${file}: ${rewrites} listen(s) rewritten`);
      }
      if (!files.length) reporter.info("Nothing to rewrite");
      const t = await nginx.test();
      if (!t.ok) {
         for (const s of saved) await restoreConfig(s.backup, s.file);
         reporter.error(`Restored ${saved.length} file(s) from backup`);
         throw OpsError.nginxInvalid(t.output);
      }
   } else {
      const kind: BindingKind = opts.universal ? "universal" : "local";
      reporter.section(`Add ${kind} binding`);
      const fpm = await detectFpm(ctx);
      const file = nginx.bindingPath(kind);
      const content = renderBindingConfig(kind, { domain: cfg.domain, publicDir: publicDir(cfg), fpmSocket: fpm.socket });
      const previous = fs.existsSync(file) ? await fs.promises.readFile(file, "utf8") : null;
      if (ctx.dryRun) {
         reporter.dim(`[dry-run] would write ${file}`);
      } else if (previous === content) {
         reporter.log(`${file} already in place`);
      } else {
         if (previous !== null) await backupConfig(file);
         await fs.promises.mkdir(path.dirname(file), { recursive: true });
         await fs.promises.writeFile(file, content, { mode: 0o644 });
         reporter.log(`Wrote ${file}`);
      }
      const t = await nginx.test();
      if (!t.ok) {
         if (!ctx.dryRun) {
            if (previous === null) await fs.promises.rm(file, { force: true });
            else await fs.promises.writeFile(file, previous);
         }
         throw OpsError.nginxInvalid(t.output);
      }
      bindingFile = file;
   }

   reporter.section("Reload");
   reporter.log(`nginx ${await nginx.reload()}`);

   reporter.section("Connectivity");
   const ip = await serverIp(ctx);
   const urls = ["http://localhost", "http://127.0.0.1", ...(ip ? [`http://${ip}`] : [])];
   const probes: ProbeResult[] = [];
   for (const url of urls) {
      const r = await ctx.net.probe(url, { timeoutMs: cfg.http.timeoutMs });
      probes.push(r);
      const code = statusCode(r.status);
      if (r.status === 0) reporter.error(`${url}: no connection (${code})${r.error ? ` ${r.error}` : ""}`);
      else if (classify(r.status) === "server-error") reporter.warn(`${url}: ${code}, connection works, application error`);
      else if (classify(r.status) === "ok") reporter.log(`${url}: ${code}`);
      else reporter.warn(`${url}: ${code}`);
   }

   const ok = probes.slice(0, 2).some((r) => connects(r.status));
   if (ok) reporter.log("Nginx answers locally");
   else reporter.error("Still no local connection; check `nginx -T` and the panel's listen settings");

   if (probes.some((r) => classify(r.status) === "server-error")) printApplicationHints(ctx);
   return { ok, probes, rewritten, bindingFile };
}

function printApplicationHints(ctx: OpsContext) {
   const root = ctx.cfg.webRoot;
   const r = ctx.reporter;
   r.plain("");
   r.warn("The connection works but Laravel answers with a server error");
   r.plain(`  Laravel log:  tail -f ${path.join(root, "storage/logs/laravel.log")}`);
   r.plain("  Usual causes: missing .env or APP_KEY, missing vendor/, database credentials, permissions");
   r.plain(`  Try:          panelops fix laravel --web-root ${root}`);
   r.plain("                panelops diagnose");
}
