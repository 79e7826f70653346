import fs from "node:fs";
import os from "node:os";
import { FASTPANEL_MARKERS } from "./defaults.js";
import { pathExistsSync } from "./utils.js";

export type SystemInfo = {
   os: string;
   kernel: string;
   arch: string;
   hostname: string;
   cpus: number;
   memTotalMb: number;
   memFreeMb: number;
   uptimeHours: number;
   loadAvg: [number, number, number];
};

const GB = 1024 ** 3;

/** PRETTY_NAME from os-release, falling back to the platform name */
export function readOsName(osRelease = "/etc/os-release"): string {
   try {
      const text = fs.readFileSync(osRelease, "utf8");
      const m = /^PRETTY_NAME="?([^"\n]*)"?$/m.exec(text);
      if (m?.[1]) return m[1];
   } catch {
      // not Linux or unreadable
   }
   return `${os.type()} ${os.release()}`;
}

export function systemInfo(): SystemInfo {
   const [l1 = 0, l5 = 0, l15 = 0] = os.loadavg();
   return {
      os: readOsName(),
      kernel: os.release(),
      arch: os.arch(),
      hostname: os.hostname(),
      cpus: os.cpus().length,
      memTotalMb: Math.round(os.totalmem() / 1024 ** 2),
      memFreeMb: Math.round(os.freemem() / 1024 ** 2),
      uptimeHours: Math.floor(os.uptime() / 3600),
      loadAvg: [l1, l5, l15],
   };
}

/** Space available to unprivileged users on the filesystem holding `p`, floored to whole GB */
export async function freeDiskGb(p = "/"): Promise<number> {
   const s = await fs.promises.statfs(p);
   return Math.floor((s.bavail * s.bsize) / GB);
}

export function detectFastPanel(markers: string[] = FASTPANEL_MARKERS): string | null {
   return markers.find((m) => pathExistsSync(m)) ?? null;
}
