import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { OpsError } from "./errors.js";
import type { CommandRunner } from "./exec.js";

const IDENT = /^[A-Za-z0-9_$]+$/;

export function assertIdentifier(name: string, what = "identifier"): string {
   if (!IDENT.test(name)) throw OpsError.configInvalid(`Invalid MySQL ${what} "${name}": only letters, digits, _ and $ are allowed`);
   return name;
}

export function quoteIdent(name: string): string {
   return "`" + name.replace(/`/g, "``") + "`";
}

export function quoteString(s: string): string {
   return "'" + s.replace(/\\/g, "\\\\").replace(/'/g, "\\'") + "'";
}

/** 24 characters from the URL-safe base64 alphabet */
export function generatePassword(length = 24): string {
   return randomBytes(Math.ceil((length * 3) / 4) + 3).toString("base64url").slice(0, length);
}

export type ProvisionSpec = {
   database: string;
   user: string;
   password: string;
   /** Host part of the account; localhost unless the app connects over TCP from elsewhere */
   userHost?: string;
};

/**
 * Statements that converge on: database present, account present with this
 * password, full rights on the database. Safe to replay.
 */
export function buildProvisionSql(spec: ProvisionSpec): string {
   const db = quoteIdent(assertIdentifier(spec.database, "database name"));
   const account = `${quoteString(assertIdentifier(spec.user, "user name"))}@${quoteString(spec.userHost ?? "localhost")}`;
   const pw = quoteString(spec.password);
   return [
      `CREATE DATABASE IF NOT EXISTS ${db} CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;`,
      `CREATE USER IF NOT EXISTS ${account} IDENTIFIED BY ${pw};`,
      `ALTER USER ${account} IDENTIFIED BY ${pw};`,
      `GRANT ALL PRIVILEGES ON ${db}.* TO ${account};`,
      "FLUSH PRIVILEGES;",
      "",
   ].join("\n");
}

export type MysqlConnection = {
   host: string;
   user: string;
   /** Passed as MYSQL_PWD, never as an argument */
   password?: string;
};

export class MysqlClient {
   constructor(private readonly runner: CommandRunner, private readonly conn: MysqlConnection) { }

   private base(): string[] {
      return ["-h", this.conn.host, "-u", this.conn.user];
   }

   private env(): Record<string, string> {
      return this.conn.password ? { MYSQL_PWD: this.conn.password } : {};
   }

   async ping(): Promise<boolean> {
      const r = await this.runner.run("mysql", [...this.base(), "-N", "-B", "-e", "SELECT 1"], {
         env: this.env(), allowFailure: true, readOnly: true, timeoutMs: 15_000,
      });
      return r.code === 0;
   }

   async databaseExists(database: string): Promise<boolean> {
      assertIdentifier(database, "database name");
      const r = await this.runner.run("mysql", [
         ...this.base(), "-N", "-B", "-e",
         `SELECT SCHEMA_NAME FROM INFORMATION_SCHEMA.SCHEMATA WHERE SCHEMA_NAME = ${quoteString(database)}`,
      ], { env: this.env(), allowFailure: true, readOnly: true });
      return r.code === 0 && r.stdout.trim() === database;
   }

   /** SQL goes through stdin so the password stays out of the process list. */
   async provision(spec: ProvisionSpec): Promise<void> {
      await this.runner.run("mysql", this.base(), { env: this.env(), input: buildProvisionSql(spec) });
   }

   async dump(database: string, file: string): Promise<void> {
      assertIdentifier(database, "database name");
      await fs.promises.mkdir(path.dirname(file), { recursive: true });
      await this.runner.run("mysqldump", [
         ...this.base(),
         "--single-transaction", "--routines", "--triggers",
         `--result-file=${file}`,
         database,
      ], { env: this.env() });
   }

   async importFile(database: string, file: string): Promise<void> {
      assertIdentifier(database, "database name");
      const sql = await fs.promises.readFile(file, "utf8");
      await this.runner.run("mysql", [...this.base(), database], { env: this.env(), input: sql });
   }
}

export type Credentials = { host: string; database: string; user: string; password: string };

/** <dir>/<database>_credentials.txt, readable by root only */
export async function writeCredentials(dir: string, c: Credentials, now: Date = new Date()): Promise<string> {
   await fs.promises.mkdir(dir, { recursive: true });
   const file = path.join(dir, `${c.database}_credentials.txt`);
   const body = [
      "Database credentials",
      "====================",
      `Host: ${c.host}`,
      `Database: ${c.database}`,
      `Username: ${c.user}`,
      `Password: ${c.password}`,
      `Created: ${now.toISOString()}`,
      "",
   ].join("\n");
   await fs.promises.writeFile(file, body, { mode: 0o600 });
   await fs.promises.chmod(file, 0o600);
   return file;
}
