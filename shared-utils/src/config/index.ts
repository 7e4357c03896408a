/**
 * Shared configuration utilities for services
 */

export interface ServiceConfig {
  mode: string;
  logLevel: string;
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(
  env: NodeJS.ProcessEnv = process.env
): ServiceConfig {
  return {
    mode: env.MODE ?? env.NODE_ENV ?? "development",
    logLevel: (env.LOG_LEVEL ?? "info").toLowerCase(),
  };
}
