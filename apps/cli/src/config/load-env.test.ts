import * as dotenv from 'dotenv';
import * as fs from 'node:fs';
import { afterEach, describe, expect, test, vi } from 'vitest';

import { loadEnv } from './load-env';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('loadEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('loads the first existing candidate without overriding', () => {
    vi.stubEnv('ENV_FILE', '');
    vi.mocked(fs.existsSync).mockImplementation(
      (candidate) => candidate === '/work/.env',
    );

    expect(loadEnv({ cwd: '/work' })).toBe('/work/.env');
    expect(fs.existsSync).toHaveBeenNthCalledWith(1, '/work/.env.local');
    expect(dotenv.config).toHaveBeenCalledWith({
      path: '/work/.env',
      override: false,
    });
  });

  test('tries an explicit env file first', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);

    expect(loadEnv({ envFile: ' config/.env.test ', cwd: '/work' })).toBe(
      'config/.env.test',
    );
  });

  test('returns null when nothing is found', () => {
    vi.stubEnv('ENV_FILE', '');
    vi.mocked(fs.existsSync).mockReturnValue(false);

    expect(loadEnv({ cwd: '/work' })).toBeNull();
    expect(dotenv.config).not.toHaveBeenCalled();
  });
});
