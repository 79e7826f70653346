import type { CommandRunner } from "./exec.js";

export function schedulerLine(webRoot: string): string {
   return `* * * * * cd ${webRoot} && php artisan schedule:run >> /dev/null 2>&1`;
}

export function hasSchedulerEntry(crontab: string): boolean {
   return crontab.split(/\r?\n/).some((l) => !l.trim().startsWith("#") && l.includes("artisan schedule:run"));
}

/** `crontab -l` exits 1 with "no crontab for <user>" when the table is empty */
async function readCrontab(runner: CommandRunner, user: string): Promise<string> {
   const r = await runner.run("crontab", ["-l", "-u", user], { allowFailure: true, readOnly: true });
   return r.code === 0 ? r.stdout : "";
}

export async function hasSchedulerCron(runner: CommandRunner, user: string): Promise<boolean> {
   return hasSchedulerEntry(await readCrontab(runner, user));
}

/** Append the Laravel scheduler line unless some entry already runs it. */
export async function ensureSchedulerCron(runner: CommandRunner, user: string, webRoot: string): Promise<"added" | "present"> {
   const current = await readCrontab(runner, user);
   if (hasSchedulerEntry(current)) return "present";
   const base = current && !current.endsWith("\n") ? `${current}\n` : current;
   await runner.run("crontab", ["-u", user, "-"], { input: `${base}${schedulerLine(webRoot)}\n` });
   return "added";
}
