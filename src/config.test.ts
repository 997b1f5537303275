import { describe, it, expect } from 'vitest';
import { getConfig } from './config';

describe('getConfig', () => {
  it('uses defaults for unset variables', () => {
    expect(getConfig({})).toEqual({
      exportDir: './exports',
      largeProjectThreshold: 500,
      defaultAuthor: '',
      verbose: false,
    });
  });

  it('reads values from the environment', () => {
    expect(
      getConfig({
        EXPORT_DIR: '/tmp/out',
        LARGE_PROJECT_THRESHOLD: '20',
        DEFAULT_AUTHOR: 'Jane Placeholder',
        VERBOSE: 'true',
      })
    ).toEqual({ exportDir: '/tmp/out', largeProjectThreshold: 20, defaultAuthor: 'Jane Placeholder', verbose: true });
  });

  it('rejects a threshold that is not a positive number', () => {
    expect(() => getConfig({ LARGE_PROJECT_THRESHOLD: 'lots' })).toThrow(
      'Invalid environment variables: LARGE_PROJECT_THRESHOLD'
    );
    expect(() => getConfig({ LARGE_PROJECT_THRESHOLD: '0' })).toThrow('LARGE_PROJECT_THRESHOLD');
  });
});
