import { ConfigManager } from './app';

describe('ConfigManager', () => {
  it('applies defaults to an empty environment', () => {
    const config = new ConfigManager({});

    expect(config.getLoggingConfig()).toEqual({
      level: 'info',
      environment: 'development',
      version: '1.0.0',
      lokiHost: undefined,
    });
    expect(config.getDatabaseConfig()).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'record_store',
      user: 'postgres',
      password: 'password',
      min: 2,
      max: 20,
    });
    expect(config.getRecordStoreConfig()).toEqual({
      table: 'records',
      idColumn: 'id',
      externalIdField: undefined,
    });
  });

  it('coerces numeric settings and reads the record store', () => {
    const config = new ConfigManager({
      NODE_ENV: 'test',
      DB_PORT: '6543',
      RECORD_STORE_TABLE: 'contacts',
      RECORD_STORE_EXTERNAL_ID_FIELD: 'email',
    });

    expect(config.getLoggingConfig().environment).toBe('test');
    expect(config.getDatabaseConfig().port).toBe(6543);
    expect(config.getRecordStoreConfig()).toEqual({
      table: 'contacts',
      idColumn: 'id',
      externalIdField: 'email',
    });
  });

  it('reads logger settings', () => {
    const config = new ConfigManager({
      LOG_LEVEL: 'debug',
      LOKI_HOST: 'http://loki.test:3100',
      PACKAGE_VERSION: '2.3.0',
    });

    expect(config.getLoggingConfig()).toEqual({
      level: 'debug',
      environment: 'development',
      version: '2.3.0',
      lokiHost: 'http://loki.test:3100',
    });
  });

  it('rejects invalid settings', () => {
    expect(() => new ConfigManager({ DB_PORT: '70000' })).toThrow(/^Invalid configuration: DB_PORT/);
    expect(() => new ConfigManager({ RECORD_STORE_TABLE: 'contacts; DROP TABLE x' })).toThrow(
      'RECORD_STORE_TABLE: Must be a plain SQL identifier'
    );
  });
});
