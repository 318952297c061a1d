// Application configuration - read from the environment
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export interface AppConfig {
  port: number;
  databasePath: string;
  /** IANA zone used for windows, schedules and reports */
  timeZone: string;
  /** When set, console output is also appended to this file */
  logFile?: string;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  port: 3000,
  databasePath: 'data/monitor.db',
  timeZone: 'Europe/Paris',
};

/**
 * Whether Intl knows the zone name
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export class ConfigManager {
  /**
   * Validates if the given object is a valid AppConfig
   */
  validate(config: unknown): config is AppConfig {
    if (!config || typeof config !== 'object') {
      return false;
    }

    const c = config as Record<string, unknown>;

    if (typeof c.port !== 'number' || !Number.isInteger(c.port) || c.port < 1 || c.port > 65535) return false;
    if (typeof c.databasePath !== 'string' || c.databasePath.length === 0) return false;
    if (typeof c.timeZone !== 'string' || !isValidTimeZone(c.timeZone)) return false;
    if (c.logFile !== undefined && typeof c.logFile !== 'string') return false;

    return true;
  }

  /**
   * Build the configuration from environment variables.
   * Throws ConfigValidationError for an invalid port or time zone.
   */
  fromEnv(env: NodeJS.ProcessEnv): AppConfig {
    const config: AppConfig = { ...DEFAULT_APP_CONFIG };

    const port = env.PORT?.trim();
    if (port) {
      const parsed = Number(port);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        throw new ConfigValidationError(`Invalid PORT: ${port}`);
      }
      config.port = parsed;
    }

    const databasePath = env.DATABASE_PATH?.trim();
    if (databasePath) {
      config.databasePath = databasePath;
    }

    const timeZone = env.MONITOR_TIMEZONE?.trim();
    if (timeZone) {
      if (!isValidTimeZone(timeZone)) {
        throw new ConfigValidationError(`Invalid MONITOR_TIMEZONE: ${timeZone}`);
      }
      config.timeZone = timeZone;
    }

    const logFile = env.LOG_FILE?.trim();
    if (logFile) {
      config.logFile = logFile;
    }

    if (!this.validate(config)) {
      throw new ConfigValidationError('Invalid configuration');
    }
    return config;
  }
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return new ConfigManager().fromEnv(env);
}
