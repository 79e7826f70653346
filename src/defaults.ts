import type { ResolvedConfig } from "./types.js";

/** Extensions a stock Laravel install expects from PHP */
export const LARAVEL_PHP_EXTENSIONS = [
   "bcmath", "ctype", "fileinfo", "json", "mbstring", "openssl", "pdo",
   "pdo_mysql", "tokenizer", "xml", "curl", "zip", "gd", "intl", "redis",
];

// Leftovers of WordPress or static placeholder sites found in fresh panel web roots
export const CLEAN_DIRS = [
   "wp-admin", "wp-content", "wp-includes", "node_modules", "vendor", ".git",
   "old_site", "backup", "temp", "cache",
];

export const CLEAN_FILES = [
   "wp-config.php", "wp-load.php", "wp-blog-header.php", "wp-cron.php",
   "wp-links-opml.php", "wp-mail.php", "wp-settings.php", "wp-signup.php",
   "wp-trackback.php", "xmlrpc.php", "license.txt", "readme.html",
   "index.html", "default.html", "coming-soon.html", ".htaccess.old",
   "robots.txt.old", "config.php", "settings.php", "install.php", "setup.php",
   "admin.php", "login.php", "register.php",
];

export const CLEAN_PATTERNS = ["**/*.tmp", "**/*.cache", "**/.DS_Store", "**/Thumbs.db", "*.log"];

export const PRESERVE = [".env", "storage/logs", "storage/app/public", "public/uploads"];

export const EXCLUDE = ["node_modules/**", ".git/**", "storage/logs/*.log"];

export const WRITABLE_DIRS = ["storage", "bootstrap/cache"];

export const FASTPANEL_MARKERS = ["/usr/local/fastpanel", "/usr/local/fastpanel2", "/etc/nginx/fastpanel.conf"];

export const DEFAULT_TIMEOUT_MS = 10_000;

export const COMPOSER_TIMEOUT_MS = 900_000;

export const CERT_WARN_DAYS = 30;

export const MIN_FREE_DISK_GB = 5;

/** Everything but the fields that depend on domain, panel and web user */
export function baseDefaults(): Omit<ResolvedConfig, "panel" | "domain" | "webUser" | "webGroup" | "webRoot" | "mysql" | "backup" | "http"> {
   return {
      sourceDir: "~/app",
      php: { minVersion: "8.1", extensions: [...LARAVEL_PHP_EXTENSIONS] },
      nginx: {
         mainConfig: "/etc/nginx/nginx.conf",
         sitesAvailable: "/etc/nginx/sites-available",
         sitesEnabled: "/etc/nginx/sites-enabled",
         confDir: "/etc/nginx/conf.d",
         panelConfigDirs: ["/etc/nginx/fastpanel2-sites", "/usr/local/mgr5/etc"],
         errorLog: "/var/log/nginx/error.log",
         manageSite: false,
      },
      clean: { dirs: [...CLEAN_DIRS], files: [...CLEAN_FILES], patterns: [...CLEAN_PATTERNS] },
      preserve: [...PRESERVE],
      exclude: [...EXCLUDE],
      services: [],
      logDir: "/tmp",
      errorPolicy: "abort",
      confirm: "auto",
      requireRoot: true,
      hooks: {},
   };
}
