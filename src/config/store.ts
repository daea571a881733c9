/**
 * Document Store Configuration Module
 *
 * Loads the GitHub repository coordinates, collection paths and snapshot
 * freshness window from environment variables.
 *
 * @module config/store
 */

/**
 * Application environment types
 */
export type Environment = 'development' | 'staging' | 'production' | 'test';

/**
 * Paths of the four collections inside the repository
 */
export interface CollectionPaths {
  readonly employees: string;
  readonly vacations: string;
  readonly constraints: string;
  readonly config: string;
}

/**
 * Document store configuration interface
 */
export interface StoreConfig {
  /**
   * GitHub personal access token
   */
  readonly token: string;

  /**
   * Repository owner (user or organisation)
   */
  readonly owner: string;

  /**
   * Repository name
   */
  readonly repo: string;

  /**
   * Branch to read and commit on; the repository default when absent
   */
  readonly branch?: string;

  /**
   * REST API base URL
   */
  readonly apiUrl: string;

  /**
   * Request timeout in milliseconds
   */
  readonly timeoutMs: number;

  readonly paths: CollectionPaths;

  /**
   * How long a loaded snapshot is served before it is reloaded
   */
  readonly snapshotTtlMs: number;

  readonly environment: Environment;
}

/**
 * Singleton instance of store configuration
 */
let storeConfigInstance: StoreConfig | null = null;

function parseEnvironment(env: string | undefined): Environment {
  switch (env?.toLowerCase()) {
    case 'production':
      return 'production';
    case 'staging':
      return 'staging';
    case 'test':
      return 'test';
    case undefined:
    case 'development':
      return 'development';
    default:
      console.warn(`[STORE_CONFIG] Invalid environment "${env}", defaulting to "development"`);
      return 'development';
  }
}

function getEnvString(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value !== undefined && value.trim().length > 0 ? value.trim() : defaultValue;
}

function getEnvInteger(key: string, defaultValue: number, min: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min) {
    console.warn(`[STORE_CONFIG] Invalid ${key} "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Read a required variable; outside production-like environments a
 * placeholder keeps local runs and tests working without credentials
 */
function getRequiredEnv(key: string, environment: Environment, placeholder: string): string {
  const value = process.env[key]?.trim();
  if (value) {
    return value;
  }

  if (environment === 'test') {
    return placeholder;
  }

  throw new Error(`[STORE_CONFIG] ${key} environment variable is required`);
}

/**
 * Load store configuration from environment variables
 *
 * @throws {Error} If a required variable is missing outside the test environment
 */
function loadStoreConfig(): StoreConfig {
  console.log('[STORE_CONFIG] Loading document store configuration from environment variables...');

  const environment = parseEnvironment(process.env.NODE_ENV);
  const branch = process.env.GITHUB_BRANCH?.trim();

  const config: StoreConfig = {
    token: getRequiredEnv('GITHUB_TOKEN', environment, 'test-token'),
    owner: getRequiredEnv('GITHUB_OWNER', environment, 'test-owner'),
    repo: getRequiredEnv('GITHUB_REPO', environment, 'test-repo'),
    branch: branch ? branch : undefined,
    apiUrl: getEnvString('GITHUB_API_URL', 'https://api.github.com').replace(/\/+$/, ''),
    timeoutMs: getEnvInteger('GITHUB_TIMEOUT_MS', 10000, 1),
    paths: {
      employees: getEnvString('EMPLOYEES_FILE_PATH', 'data/employees.csv'),
      vacations: getEnvString('VACATIONS_FILE_PATH', 'data/vacations.csv'),
      constraints: getEnvString('CONSTRAINTS_FILE_PATH', 'data/constraints.csv'),
      config: getEnvString('CONFIG_FILE_PATH', 'data/config.json'),
    },
    snapshotTtlMs: getEnvInteger('SNAPSHOT_TTL_MS', 5 * 60 * 1000, 0),
    environment,
  };

  console.log('[STORE_CONFIG] Document store configuration loaded:', {
    owner: config.owner,
    repo: config.repo,
    branch: config.branch ?? '(default)',
    apiUrl: config.apiUrl,
    snapshotTtlMs: config.snapshotTtlMs,
    environment: config.environment,
  });

  return config;
}

/**
 * Get store configuration (singleton)
 */
export function getStoreConfig(): StoreConfig {
  if (!storeConfigInstance) {
    storeConfigInstance = loadStoreConfig();
  }
  return storeConfigInstance;
}

/**
 * Drop the cached configuration so the next call re-reads the environment
 */
export function resetStoreConfig(): void {
  storeConfigInstance = null;
}
