export type OpsErrorCode =
   | "CONFIG_INVALID"
   | "NOT_ROOT"
   | "PREREQUISITE_MISSING"
   | "COMMAND_FAILED"
   | "COMMAND_TIMEOUT"
   | "STEP_FAILED"
   | "BACKUP_FAILED"
   | "RESTORE_FAILED"
   | "NGINX_CONFIG_INVALID"
   | "ABORTED"
   | "UNKNOWN";

export class OpsError extends Error {
   readonly code: OpsErrorCode;
   readonly exitCode: number;

   constructor(code: OpsErrorCode, message: string, options: { cause?: unknown; exitCode?: number } = {}) {
      super(message, options.cause === undefined ? undefined : { cause: options.cause });
      this.name = "OpsError";
      this.code = code;
      this.exitCode = options.exitCode ?? 1;
   }

   static configInvalid(message: string): OpsError {
      return new OpsError("CONFIG_INVALID", message);
   }

   static notRoot(command: string): OpsError {
      return new OpsError("NOT_ROOT", `Run as root: sudo panelops ${command}`);
   }

   static prerequisiteMissing(what: string): OpsError {
      return new OpsError("PREREQUISITE_MISSING", `${what} is not installed or not in PATH`);
   }

   static stepFailed(step: string, cause: unknown): OpsError {
      const reason = cause instanceof Error ? cause.message : String(cause);
      return new OpsError("STEP_FAILED", `${step}: ${reason}`, { cause });
   }

   static backupFailed(message: string, cause?: unknown): OpsError {
      return new OpsError("BACKUP_FAILED", message, { cause });
   }

   static restoreFailed(message: string, cause?: unknown): OpsError {
      return new OpsError("RESTORE_FAILED", message, { cause });
   }

   static nginxInvalid(output: string): OpsError {
      return new OpsError("NGINX_CONFIG_INVALID", `nginx -t failed:\n${output.trim()}`);
   }

   static aborted(message = "Aborted by user."): OpsError {
      return new OpsError("ABORTED", message, { exitCode: 130 });
   }

   /** Declined at a y/N prompt; not a failure */
   static cancelled(what = "Operation"): OpsError {
      return new OpsError("ABORTED", `${what} cancelled by user`, { exitCode: 0 });
   }
}

/**
 * Error thrown when an external command exits non-zero
 */
export class CommandError extends OpsError {
   constructor(
      public readonly command: string,
      public readonly status: number,
      public readonly stderr: string,
      public readonly stdout: string,
   ) {
      super("COMMAND_FAILED", `${command} exited with code ${status}${stderr.trim() ? `: ${firstLine(stderr)}` : ""}`);
      this.name = "CommandError";
   }
}

export class CommandTimeoutError extends OpsError {
   constructor(public readonly command: string, public readonly timeoutMs: number) {
      super("COMMAND_TIMEOUT", `${command} timed out after ${timeoutMs}ms`);
      this.name = "CommandTimeoutError";
   }
}

function firstLine(s: string): string {
   return s.trim().split(/\r?\n/)[0] ?? "";
}
