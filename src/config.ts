import { MongoClient } from 'mongodb';
import type { Db, MongoClientOptions } from 'mongodb';
import type { LevelWithSilent } from 'pino';
import { InvalidArgumentError } from './errors.js';
import { isLogLevel } from './logger.js';

export interface ConnectionConfig {
  uri: string;
  /** Database used when none is named in the URI. */
  database?: string;
  appName?: string;
  logLevel?: LevelWithSilent;
}

type Env = Readonly<Record<string, string | undefined>>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Reads MONGODB_URI (required), MONGODB_DATABASE, MONGODB_APP_NAME and LOG_LEVEL.
 */
export function loadConnectionConfig(env: Env = process.env): ConnectionConfig {
  const uri = optional(env, 'MONGODB_URI');
  if (uri === undefined) {
    throw new InvalidArgumentError('MONGODB_URI', 'MONGODB_URI environment variable is required');
  }
  if (!uri.startsWith('mongodb://') && !uri.startsWith('mongodb+srv://')) {
    throw new InvalidArgumentError('MONGODB_URI', 'MONGODB_URI must start with mongodb:// or mongodb+srv://');
  }

  const config: ConnectionConfig = { uri };
  const database = optional(env, 'MONGODB_DATABASE');
  if (database !== undefined) config.database = database;
  const appName = optional(env, 'MONGODB_APP_NAME');
  if (appName !== undefined) config.appName = appName;

  const logLevel = optional(env, 'LOG_LEVEL');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new InvalidArgumentError('LOG_LEVEL', `LOG_LEVEL "${logLevel}" is not a known log level`);
    }
    config.logLevel = logLevel;
  }
  return config;
}

/** Builds a client for `config`. The connection is opened lazily by the driver. */
export function createMongoClient(config: ConnectionConfig): MongoClient {
  const options: MongoClientOptions = {};
  if (config.appName !== undefined) options.appName = config.appName;
  return new MongoClient(config.uri, options);
}

export function getDatabase(client: MongoClient, config: ConnectionConfig): Db {
  return client.db(config.database);
}
