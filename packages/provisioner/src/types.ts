/**
 * Names of the OS services the stack depends on
 */
export interface ServiceNames {
  /** Database engine, e.g. `mariadb` */
  database: string
  /** Web server, e.g. `httpd` */
  webServer: string
  /** PHP runtime, e.g. `php-fpm` */
  php: string
}

export interface DatabaseConfig {
  name: string
  user: string
  password: string
  /** Host part of the MySQL account (`'user'@'host'`) */
  host: string
}

export interface WordPressConfig {
  enabled: boolean
  /** Write wp-config.php after the files are in place */
  configure: boolean
  url: string
  tablePrefix: string
}

export interface PhpMyAdminConfig {
  enabled: boolean
  url: string
  /** Subdirectory of the web root the tool is served from */
  directory: string
}

export interface PhpConfig {
  /** Apply the ini overrides below */
  enabled: boolean
  iniPath: string
  settings: Record<string, string>
}

export interface NetworkConfig {
  timeout: number
  userAgent: string
}

export interface ProvisionConfig {
  verbose: boolean
  /** Prefix privileged commands with sudo */
  useSudo: boolean
  services: ServiceNames
  database: DatabaseConfig
  webRoot: string
  webUser: string
  webGroup: string
  /** Scratch space for downloads and extraction */
  workDir: string
  siteUrl: string
  wordpress: WordPressConfig
  phpMyAdmin: PhpMyAdminConfig
  php: PhpConfig
  network: NetworkConfig
}

export type ServiceStatus = 'running' | 'stopped' | 'unknown'

export interface CommandOptions {
  /** Written to the child's stdin */
  input?: string
  /** Run through sudo when the config asks for it */
  sudo?: boolean
  cwd?: string
}

export interface CommandResult {
  code: number
  stdout: string
  stderr: string
}

/**
 * Executes OS commands. Resolves with the exit status whatever it is and
 * rejects only when the process could not be spawned.
 */
export interface CommandRunner {
  run: (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>
}

export interface ProvisionContext {
  config: ProvisionConfig
  runner: CommandRunner
}

export interface ProvisionStep {
  /** Stable kebab-case identifier */
  name: string
  description: string
  /** Resolves true when the step's effect is already present */
  check: (ctx: ProvisionContext) => Promise<boolean>
  apply: (ctx: ProvisionContext) => Promise<void>
}

export type StepOutcome = 'applied' | 'skipped' | 'pending' | 'failed'

export interface StepResult {
  name: string
  description: string
  outcome: StepOutcome
  durationMs: number
  error?: string
}

export interface ProvisionReport {
  ok: boolean
  results: StepResult[]
  failedStep?: string
  durationMs: number
}

export interface RunOptions {
  /** Only run the checks */
  dryRun?: boolean
  /** Show the terminal spinner while a step applies */
  spinner?: boolean
}
