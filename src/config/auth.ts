/**
 * Authentication Configuration Module
 *
 * Passwords for the placeholder gate and the signing settings of the session
 * tokens it issues.
 *
 * @module config/auth
 */

/**
 * JWT configuration
 */
export interface JWTConfig {
  /**
   * Signing secret
   */
  readonly secret: string;

  /**
   * Token lifetime in seconds
   */
  readonly expiresInSeconds: number;

  readonly issuer: string;

  readonly audience: string;

  readonly algorithm: 'HS256';
}

/**
 * Login rate limit configuration
 */
export interface RateLimitConfig {
  readonly windowMs: number;
  readonly maxAttempts: number;
}

/**
 * Complete authentication configuration
 */
export interface AuthConfig {
  /**
   * Shared password every employee uses
   */
  readonly appPassword: string;

  /**
   * Administrator password
   */
  readonly adminPassword: string;

  readonly jwt: JWTConfig;

  readonly loginRateLimit: RateLimitConfig;
}

/**
 * Singleton instance of auth configuration
 */
let authConfigInstance: AuthConfig | null = null;

/**
 * Load and parse environment variable as string
 */
function getEnvString(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value !== undefined && value.trim().length > 0 ? value.trim() : defaultValue;
}

/**
 * Load and parse environment variable as number
 */
function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.warn(`[AUTH_CONFIG] Invalid number for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function getRequiredSecret(key: string): string {
  const value = process.env[key]?.trim();
  if (!value) {
    throw new Error(`[AUTH_CONFIG] ${key} environment variable is required`);
  }
  return value;
}

function loadAuthConfig(): AuthConfig {
  const config: AuthConfig = {
    appPassword: getRequiredSecret('APP_PASSWORD'),
    adminPassword: getRequiredSecret('ADMIN_PASSWORD'),
    jwt: {
      secret: getRequiredSecret('JWT_SECRET'),
      expiresInSeconds: getEnvNumber('JWT_EXPIRES_IN_SECONDS', 8 * 60 * 60),
      issuer: getEnvString('JWT_ISSUER', 'vacation-desk'),
      audience: getEnvString('JWT_AUDIENCE', 'vacation-desk-api'),
      algorithm: 'HS256',
    },
    loginRateLimit: {
      windowMs: getEnvNumber('LOGIN_RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
      maxAttempts: getEnvNumber('LOGIN_RATE_LIMIT_MAX', 5),
    },
  };

  if (config.jwt.secret.length < 32) {
    console.warn('[AUTH_CONFIG] JWT_SECRET is shorter than 32 characters');
  }

  return config;
}

/**
 * Get authentication configuration (singleton)
 *
 * @throws {Error} If a password or the JWT secret is not configured
 */
export function getAuthConfig(): AuthConfig {
  if (!authConfigInstance) {
    authConfigInstance = loadAuthConfig();
  }
  return authConfigInstance;
}

/**
 * Drop the cached configuration so the next call re-reads the environment
 */
export function resetAuthConfig(): void {
  authConfigInstance = null;
}
