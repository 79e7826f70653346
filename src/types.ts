export type PanelKind = "fastpanel" | "plain";

export type ErrorPolicy = "abort" | "continue";

export type ConfirmMode = "auto" | "always" | "never";

export interface BackupConfig {
   /** Where tarballs and database dumps are written */
   dir?: string;
   /** File name prefix; defaults to backup_<domain> */
   prefix?: string;
   /** How many file backups to keep after a deploy */
   retain?: number;
}

export interface PhpConfig {
   /** Lowest PHP version accepted by `check` and `deploy` */
   minVersion?: string;
   /** Major.minor used for the FPM service and socket names; detected when omitted */
   version?: string;
   extensions?: string[];
   fpmService?: string;
   fpmSocket?: string;
}

export interface MysqlConfig {
   host?: string;
   rootUser?: string;
   database?: string;
   user?: string;
   /** Directory receiving <database>_credentials.txt after provisioning */
   credentialsDir?: string;
}

export interface NginxConfig {
   mainConfig?: string;
   sitesAvailable?: string;
   sitesEnabled?: string;
   confDir?: string;
   /** Panel-owned config trees scanned by `fix nginx-binding` */
   panelConfigDirs?: string[];
   /** Error log tailed by `diagnose` */
   errorLog?: string;
   /** When true `deploy` writes and enables its own server block */
   manageSite?: boolean;
   /** Address reported by `hostname -I` is used when omitted */
   serverIp?: string;
}

export interface BurstConfig {
   rounds?: number;
   concurrency?: number;
}

export interface HttpConfig {
   baseUrls?: string[];
   pages?: string[];
   timeoutMs?: number;
   burst?: BurstConfig;
}

export interface CleanConfig {
   dirs?: string[];
   files?: string[];
   patterns?: string[];
}

export type HookItem =
   | string
   | {
      run: string | string[];           // "php artisan down" OR ["php", "artisan", "up"]
      shell?: boolean;                  // default true for strings, false for arrays
      cwd?: string;                     // default: webRoot
      timeoutMs?: number;               // default: 10 * 60 * 1000
      env?: Record<string, string>;
      continueOnError?: boolean;
   };

export type HooksConfig = {
   pre?: HookItem[];
   post?: HookItem[];
};

/** Descriptor after defaults, panel derivation and env expansion. */
export interface ResolvedConfig {
   panel: PanelKind;
   domain: string;
   webUser: string;
   webGroup: string;
   webRoot: string;
   sourceDir: string;
   backup: Required<BackupConfig>;
   php: Required<Pick<PhpConfig, "minVersion" | "extensions">> & Pick<PhpConfig, "version" | "fpmService" | "fpmSocket">;
   mysql: Required<MysqlConfig>;
   nginx: Required<Omit<NginxConfig, "serverIp">> & Pick<NginxConfig, "serverIp">;
   http: Required<Omit<HttpConfig, "burst">> & { burst: Required<BurstConfig> };
   clean: Required<CleanConfig>;
   preserve: string[];
   exclude: string[];
   services: string[];
   logDir: string;
   errorPolicy: ErrorPolicy;
   confirm: ConfirmMode;
   requireRoot: boolean;
   hooks: HooksConfig;
}

export type CheckStatus = "pass" | "warn" | "fail" | "info";

export interface CheckResult {
   name: string;
   status: CheckStatus;
   detail?: string;
}
