import { loadConfig } from '../src/config/config';
import { ConfigError } from '../src/utils/errors';

describe('loadConfig', () => {
  test('reads project, namespace and log level from the environment', () => {
    const config = loadConfig({
      DATASTORE_PROJECT_ID: 'my-project',
      DATASTORE_NAMESPACE: 'tenant-a',
      LOG_LEVEL: 'debug'
    });

    expect(config).toEqual({ projectId: 'my-project', namespace: 'tenant-a', logLevel: 'debug' });
  });

  test('overrides win over the environment', () => {
    const config = loadConfig(
      { DATASTORE_PROJECT_ID: 'env-project', DATASTORE_NAMESPACE: 'env-ns' },
      { projectId: 'explicit-project' }
    );

    expect(config).toEqual({ projectId: 'explicit-project', namespace: 'env-ns' });
  });

  test('requires a project id', () => {
    expect(() => loadConfig({})).toThrow('No project id given and DATASTORE_PROJECT_ID is not set');
  });

  test('accepts a domain-scoped project id', () => {
    expect(loadConfig({}, { projectId: 'example.com:my-app' })).toEqual({ projectId: 'example.com:my-app' });
  });

  test('rejects a blank project id', () => {
    expect(() => loadConfig({ DATASTORE_PROJECT_ID: '   ' })).toThrow(ConfigError);
  });

  test('accepts the silent log level', () => {
    expect(loadConfig({ DATASTORE_PROJECT_ID: 'my-project', LOG_LEVEL: 'silent' }))
      .toEqual({ projectId: 'my-project', logLevel: 'silent' });
  });

  test('rejects an unknown log level', () => {
    expect(() => loadConfig({ DATASTORE_PROJECT_ID: 'my-project', LOG_LEVEL: 'verbose' }))
      .toThrow("Invalid LOG_LEVEL 'verbose'");
  });
});
