import { errorMessage } from "./utils.js";

export type ProbeOptions = {
   timeoutMs?: number;
   method?: string;
   body?: string;
   headers?: Record<string, string>;
   /** Bytes of the body kept in bodyPreview */
   previewBytes?: number;
};

export type ProbeResult = {
   url: string;
   /** 0 when no HTTP response arrived */
   status: number;
   timeMs: number;
   size: number;
   headers: Record<string, string>;
   bodyPreview: string;
   error?: string;
};

export type ProbeFn = (url: string, opts?: ProbeOptions) => Promise<ProbeResult>;

export type ProbeClass = "ok" | "client-error" | "server-error" | "unreachable";

export const SECURITY_HEADERS = ["x-frame-options", "x-content-type-options", "x-xss-protection"];

export function classify(status: number): ProbeClass {
   if (status >= 200 && status < 400) return "ok";
   if (status >= 500) return "server-error";
   if (status >= 400) return "client-error";
   return "unreachable";
}

/** Status as curl prints it: 000 for no response */
export function statusCode(status: number): string {
   return String(status).padStart(3, "0");
}

/** One request, redirects not followed so a 301/302 counts as the answer. */
export async function probe(url: string, opts: ProbeOptions = {}): Promise<ProbeResult> {
   const t0 = performance.now();
   try {
      const res = await fetch(url, {
         method: opts.method ?? "GET",
         body: opts.body,
         headers: { "user-agent": "panelops/probe", ...(opts.headers ?? {}) },
         redirect: "manual",
         signal: AbortSignal.timeout(opts.timeoutMs ?? 10_000),
      });
      const buf = Buffer.from(await res.arrayBuffer());
      const headers: Record<string, string> = {};
      res.headers.forEach((v, k) => { headers[k] = v; });
      return {
         url,
         status: res.status,
         timeMs: Math.round(performance.now() - t0),
         size: buf.length,
         headers,
         bodyPreview: buf.subarray(0, opts.previewBytes ?? 500).toString("utf8"),
      };
   } catch (e) {
      return {
         url,
         status: 0,
         timeMs: Math.round(performance.now() - t0),
         size: 0,
         headers: {},
         bodyPreview: "",
         error: describeFetchError(e),
      };
   }
}

/** fetch hides the socket error in `cause` */
function describeFetchError(e: unknown): string {
   if (e instanceof Error && e.name === "TimeoutError") return "timed out";
   if (e instanceof Error && e.cause instanceof Error) return e.cause.message;
   return errorMessage(e);
}

export function joinUrl(base: string, page: string): string {
   const p = page.replace(/^\/+/, "");
   return p ? `${base.replace(/\/+$/, "")}/${p}` : base;
}

/** Every base URL crossed with every page, probed one at a time. */
export async function probeMatrix(baseUrls: string[], pages: string[], opts: ProbeOptions = {}, probeFn: ProbeFn = probe): Promise<ProbeResult[]> {
   const out: ProbeResult[] = [];
   for (const base of baseUrls) {
      for (const page of pages.length ? pages : [""]) {
         out.push(await probeFn(joinUrl(base, page), opts));
      }
   }
   return out;
}

/** Run fn over items with at most `limit` in flight; results keep input order. */
export function runPool<T, R>(items: T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
   const max = Math.max(1, Math.min(64, Math.floor(limit)));
   const results: R[] = new Array<R>(items.length);
   let active = 0;
   let idx = 0;
   let done = 0;

   return new Promise<R[]>((resolve, reject) => {
      if (!items.length) return resolve(results);
      const next = () => {
         while (active < max && idx < items.length) {
            const i = idx++;
            const item = items[i];
            active++;
            void (async () => {
               try {
                  results[i] = await fn(item, i);
               } catch (e) {
                  reject(e);
                  return;
               } finally {
                  active--;
                  done++;
               }
               if (done === items.length) resolve(results);
               else next();
            })();
         }
      };
      next();
   });
}

export type BurstSummary = {
   total: number;
   byStatus: Record<string, number>;
   serverErrors: number;
   unreachable: number;
};

/** `rounds` passes over `urls` through a bounded pool, to provoke errors under load. */
export async function burst(urls: string[], rounds: number, concurrency: number, opts: ProbeOptions = {}, probeFn: ProbeFn = probe): Promise<BurstSummary> {
   const jobs: string[] = [];
   for (let r = 0; r < rounds; r++) jobs.push(...urls);
   const results = await runPool(jobs, concurrency, (url) => probeFn(url, { ...opts, previewBytes: 0 }));
   const byStatus: Record<string, number> = {};
   for (const r of results) {
      const k = statusCode(r.status);
      byStatus[k] = (byStatus[k] ?? 0) + 1;
   }
   return {
      total: results.length,
      byStatus,
      serverErrors: results.filter((r) => classify(r.status) === "server-error").length,
      unreachable: results.filter((r) => r.status === 0).length,
   };
}

export function missingSecurityHeaders(headers: Record<string, string>): string[] {
   const present = new Set(Object.keys(headers).map((h) => h.toLowerCase()));
   return SECURITY_HEADERS.filter((h) => !present.has(h));
}
