import { describe, it, expect } from 'vitest';
import { MongoClient } from 'mongodb';
import { createMongoClient, getDatabase, loadConnectionConfig } from '../../src/config.js';
import { InvalidArgumentError } from '../../src/errors.js';

const URI = 'mongodb://localhost:27017';

describe('loadConnectionConfig', () => {
  it('reads the uri alone', () => {
    expect(loadConnectionConfig({ MONGODB_URI: URI })).toEqual({ uri: URI });
  });

  it('reads every variable', () => {
    expect(
      loadConnectionConfig({
        MONGODB_URI: 'mongodb+srv://cluster.example.net',
        MONGODB_DATABASE: 'shop',
        MONGODB_APP_NAME: 'catalog',
        LOG_LEVEL: 'debug',
      }),
    ).toEqual({
      uri: 'mongodb+srv://cluster.example.net',
      database: 'shop',
      appName: 'catalog',
      logLevel: 'debug',
    });
  });

  it('trims values and ignores blank ones', () => {
    expect(loadConnectionConfig({ MONGODB_URI: `  ${URI} `, MONGODB_DATABASE: '   ' })).toEqual({ uri: URI });
  });

  it('throws when MONGODB_URI is missing', () => {
    expect(() => loadConnectionConfig({})).toThrow('MONGODB_URI environment variable is required');
    expect(() => loadConnectionConfig({ MONGODB_URI: '' })).toThrow(InvalidArgumentError);
  });

  it('throws for a uri with another scheme', () => {
    expect(() => loadConnectionConfig({ MONGODB_URI: 'postgres://localhost' })).toThrow(
      'MONGODB_URI must start with mongodb:// or mongodb+srv://',
    );
  });

  it('throws for an unknown log level', () => {
    try {
      loadConnectionConfig({ MONGODB_URI: URI, LOG_LEVEL: 'loud' });
      expect.fail('expected an error');
    } catch (err) {
      if (!(err instanceof InvalidArgumentError)) throw err;
      expect(err.argument).toBe('LOG_LEVEL');
      expect(err.message).toBe('LOG_LEVEL "loud" is not a known log level');
    }
  });
});

describe('createMongoClient / getDatabase', () => {
  it('builds a client without connecting', () => {
    const client = createMongoClient({ uri: URI, appName: 'catalog' });
    expect(client).toBeInstanceOf(MongoClient);
    expect(client.options.appName).toBe('catalog');
  });

  it('selects the configured database', () => {
    const config = { uri: URI, database: 'shop' };
    const db = getDatabase(createMongoClient(config), config);
    expect(db.databaseName).toBe('shop');
  });

  it('falls back to the database named in the uri', () => {
    const config = { uri: `${URI}/inventory` };
    expect(getDatabase(createMongoClient(config), config).databaseName).toBe('inventory');
  });
});
