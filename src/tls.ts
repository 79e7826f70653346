import { X509Certificate } from "node:crypto";
import fs from "node:fs";
import tls from "node:tls";

export type CertInfo = {
   subject: string;
   issuer: string;
   validFrom: Date;
   validTo: Date;
   /** Subject alternative names, without the "DNS:" prefix */
   altNames: string[];
};

const DAY_MS = 86_400_000;

export function daysUntil(date: Date, now: Date = new Date()): number {
   return Math.floor((date.getTime() - now.getTime()) / DAY_MS);
}

function fromX509(cert: X509Certificate): CertInfo {
   return {
      subject: cert.subject.replace(/\n/g, ", "),
      issuer: cert.issuer.replace(/\n/g, ", "),
      validFrom: new Date(cert.validFrom),
      validTo: new Date(cert.validTo),
      altNames: (cert.subjectAltName ?? "").split(/,\s*/).filter(Boolean).map((s) => s.replace(/^DNS:/, "")),
   };
}

export async function certificateFromFile(file: string): Promise<CertInfo> {
   return fromX509(new X509Certificate(await fs.promises.readFile(file)));
}

/** The leaf certificate a server presents for `servername`, unverified. */
export function remoteCertificate(host: string, port = 443, timeoutMs = 10_000, servername = host): Promise<CertInfo> {
   return new Promise<CertInfo>((resolve, reject) => {
      const socket = tls.connect({ host, port, servername, rejectUnauthorized: false });
      socket.setTimeout(timeoutMs, () => {
         socket.destroy();
         reject(new Error(`TLS handshake with ${host}:${port} timed out`));
      });
      socket.once("secureConnect", () => {
         const raw = socket.getPeerX509Certificate();
         socket.end();
         if (!raw) return reject(new Error(`${host}:${port} presented no certificate`));
         resolve(fromX509(raw));
      });
      socket.once("error", reject);
   });
}

/** Let's Encrypt and the common Debian locations for a domain's certificate */
export function certificateCandidates(domain: string): string[] {
   return [
      `/etc/letsencrypt/live/${domain}/fullchain.pem`,
      `/etc/letsencrypt/live/${domain}/cert.pem`,
      `/etc/ssl/certs/${domain}.crt`,
      `/etc/ssl/certs/${domain}.pem`,
   ];
}
