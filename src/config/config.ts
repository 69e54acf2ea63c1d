// src/config/config.ts
import { ConfigError } from '../utils/errors';
import { isLoggerLevel } from '../utils/logger';
import type { LoggerLevel } from '../utils/logger';

export interface DatastoreConfig {
  projectId: string;
  namespace?: string;
  logLevel?: LoggerLevel;
}

/**
 * Reads client settings from the environment.
 *
 * `overrides` win over the environment, so callers that already know the
 * project do not need `DATASTORE_PROJECT_ID` set. `logLevel` is validated
 * here but applied by the logger module, which reads `LOG_LEVEL` at load.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<DatastoreConfig> = {}
): DatastoreConfig {
  const projectId = overrides.projectId ?? env.DATASTORE_PROJECT_ID;
  if (!projectId || !projectId.trim()) {
    throw new ConfigError('No project id given and DATASTORE_PROJECT_ID is not set');
  }

  const config: DatastoreConfig = { projectId };

  const namespace = overrides.namespace ?? env.DATASTORE_NAMESPACE;
  if (namespace) {
    config.namespace = namespace;
  }

  const logLevel = overrides.logLevel ?? env.LOG_LEVEL;
  if (logLevel) {
    if (!isLoggerLevel(logLevel)) {
      throw new ConfigError(`Invalid LOG_LEVEL '${logLevel}'`);
    }
    config.logLevel = logLevel;
  }

  return config;
}
