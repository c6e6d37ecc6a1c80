import path from 'path';
import { DEFAULT_CONFIG, createAppConfig, getPackageVersion } from '@/config/app-config';

describe('createAppConfig', () => {
  test('should apply defaults for an empty environment', () => {
    const config = createAppConfig({});

    expect(config.server).toEqual({ nodeEnv: 'development', logLevel: 'info', port: 2011, host: '0.0.0.0' });
    expect(config.auth.apiKeys).toEqual([]);
    expect(config.data.dir).toBe(path.join(process.cwd(), 'data'));
    expect(config.mcp.name).toBe('MCS Best Practices');
    expect(config.mcp.instructions).toBe(DEFAULT_CONFIG.MCP_INSTRUCTIONS);
  });

  test('should read values from the environment', () => {
    const config = createAppConfig({
      NODE_ENV: 'production',
      LOG_LEVEL: 'DEBUG',
      PORT: '8080',
      HOST: '127.0.0.1',
      API_KEYS: 'test-key-1, test-key-2\ntest-key-3,',
      DATA_DIR: '/srv/knowledge',
      MCP_SERVER_NAME: 'Test Knowledge',
    });

    expect(config.server).toEqual({ nodeEnv: 'production', logLevel: 'debug', port: 8080, host: '127.0.0.1' });
    expect(config.auth.apiKeys).toEqual(['test-key-1', 'test-key-2', 'test-key-3']);
    expect(config.data.dir).toBe(path.resolve('/srv/knowledge'));
    expect(config.mcp.name).toBe('Test Knowledge');
  });

  test('should treat empty strings as unset', () => {
    const config = createAppConfig({ PORT: '', LOG_LEVEL: ' ' });
    expect(config.server.port).toBe(2011);
    expect(config.server.logLevel).toBe('info');
  });

  test('should reject an invalid port', () => {
    expect(() => createAppConfig({ PORT: 'eighty' })).toThrow('Configuration validation failed');
  });

  test('should reject an unknown log level', () => {
    expect(() => createAppConfig({ LOG_LEVEL: 'verbose' })).toThrow('Configuration validation failed');
  });

  test('should take the version from package.json', () => {
    expect(getPackageVersion()).toBe('1.0.0');
    expect(createAppConfig({}).mcp.version).toBe('1.0.0');
  });
});
