/**
 * TypeScript interfaces for ovpn-watchdog.config.json configuration.
 *
 * The loaded configuration is assembled once per process (defaults, then the
 * config file, then environment variables), deep-frozen, and passed to every
 * component. Field names match the JSON file.
 */

/**
 * OpenVPN management interface endpoint and query settings.
 */
export interface ManagementConfig {
  /** Host the management interface listens on */
  readonly host: string;
  /** TCP port of the management interface */
  readonly port: number;
  /** Password answered to the `ENTER PASSWORD:` prompt, if the interface is protected */
  readonly password?: string;
  /** Command whose output is fingerprinted (normally `status`) */
  readonly status_command: string;
  /** Command captured as diagnostics on a failed tick (normally `load-stats`) */
  readonly load_stats_command: string;
  /** Upper bound for one management exchange, connect to terminator */
  readonly timeout_seconds: number;
}

/**
 * Service manager settings.
 */
export interface ServiceConfig {
  /** systemd unit that runs the OpenVPN server */
  readonly name: string;
  /** Service manager executable */
  readonly systemctl_command: string;
  /** Timeout for each service manager invocation */
  readonly command_timeout_seconds: number;
}

export type HashAlgorithm = 'md5' | 'sha256';

/**
 * Fingerprint store settings.
 */
export interface StateConfig {
  /** Path of the state record; the lock file lives beside it */
  readonly path: string;
  /** Digest used to fingerprint probe output */
  readonly hash_algorithm: HashAlgorithm;
  /** How long a tick waits for a concurrent tick to release the lock */
  readonly lock_timeout_seconds: number;
}

/**
 * Outcome log settings.
 */
export interface LogConfig {
  /** Append-only plaintext log file */
  readonly path: string;
}

/**
 * What to do when the management interface cannot be reached.
 *
 * - recover: collect diagnostics, restart and notify, as for a frozen status
 * - log_only: record the failure and leave the service alone
 */
export type UnreachablePolicy = 'recover' | 'log_only';

export interface PolicyConfig {
  readonly on_unreachable: UnreachablePolicy;
}

/**
 * SMTP connection security.
 *
 * - none: plain SMTP, STARTTLS is never attempted
 * - starttls: upgrade with STARTTLS when the server offers it
 * - tls: implicit TLS from the first byte
 */
export type SmtpSecurity = 'none' | 'starttls' | 'tls';

/**
 * Alert e-mail settings.
 */
export interface EmailConfig {
  /** Whether alerts are e-mailed at all */
  readonly enabled: boolean;
  readonly smtp_host: string;
  readonly smtp_port: number;
  readonly security: SmtpSecurity;
  /** SMTP username; authentication is skipped when unset */
  readonly username?: string;
  readonly password?: string;
  /** Sender address */
  readonly from: string;
  /** Recipient addresses */
  readonly recipients: readonly string[];
}

/**
 * Complete ovpn-watchdog configuration.
 */
export interface WatchdogConfig {
  /** Config format version */
  readonly version: string;
  readonly management: ManagementConfig;
  readonly service: ServiceConfig;
  readonly state: StateConfig;
  readonly log: LogConfig;
  readonly policy: PolicyConfig;
  readonly email: EmailConfig;
}
