export interface Config {
  /** Write debug entries to the log file */
  debug: boolean;
  /** Debug log path; null disables logging */
  logFile: string | null;
}

export const ENV_DEBUG = 'GOTEST_REPORT_DEBUG';
export const ENV_LOG_FILE = 'GOTEST_REPORT_LOG_FILE';

let activeConfig: Config | null = null;

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logFile = env[ENV_LOG_FILE]?.trim();
  return {
    debug: env[ENV_DEBUG] === '1',
    logFile: logFile ? logFile : null
  };
}

/**
 * Current configuration, loaded from the environment on first use
 */
export function getConfig(): Config {
  if (!activeConfig) {
    activeConfig = loadConfig();
  }
  return activeConfig;
}

/**
 * Override parts of the current configuration (CLI flags win over the environment)
 */
export function configure(overrides: Partial<Config>): Config {
  activeConfig = { ...getConfig(), ...overrides };
  return activeConfig;
}

/**
 * Drop the cached configuration so the next read goes back to the environment
 */
export function resetConfig(): void {
  activeConfig = null;
}
