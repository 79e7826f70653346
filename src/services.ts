import { succeeds, type CommandRunner } from "./exec.js";

export type ServiceState = {
   name: string;
   active: boolean;
   enabled: boolean;
};

/** systemd units through systemctl */
export class Services {
   constructor(private readonly runner: CommandRunner) { }

   isActive(name: string): Promise<boolean> {
      return succeeds(this.runner, "systemctl", ["is-active", "--quiet", name]);
   }

   isEnabled(name: string): Promise<boolean> {
      return succeeds(this.runner, "systemctl", ["is-enabled", "--quiet", name]);
   }

   async state(name: string): Promise<ServiceState> {
      const [active, enabled] = await Promise.all([this.isActive(name), this.isEnabled(name)]);
      return { name, active, enabled };
   }

   async restart(name: string): Promise<void> {
      await this.runner.run("systemctl", ["restart", name]);
   }

   /** False when the unit refused to reload; callers fall back to restart. */
   async reload(name: string): Promise<boolean> {
      const r = await this.runner.run("systemctl", ["reload", name], { allowFailure: true });
      return r.code === 0;
   }

   /** Exits 3 for a stopped unit, so the output is kept regardless of the code */
   async status(name: string): Promise<string> {
      const r = await this.runner.run("systemctl", ["status", name, "--no-pager", "-l"], { allowFailure: true, readOnly: true });
      return r.stdout.trim();
   }

   /** First running unit among alternatives such as php8.3-fpm / php-fpm */
   async firstActive(names: string[]): Promise<string | null> {
      for (const n of names) {
         if (await this.isActive(n)) return n;
      }
      return null;
   }
}
