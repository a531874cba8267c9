/**
 * @jest-environment node
 */
import path from 'node:path';

// Keep a developer's real .env out of the picture
jest.mock('dotenv', () => ({ config: jest.fn() }));

type EnvModule = typeof import('../src/env');

const loadEnvModule = (opts?: { env?: Record<string, string | undefined>; argv?: string[] }): EnvModule => {
  const originalEnv = process.env;
  const originalArgv = process.argv;

  process.env = { ...originalEnv };
  delete process.env.DEBUG_MODE;
  delete process.env.LOG_FILE;
  if (opts?.env) {
    for (const [key, value] of Object.entries(opts.env)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
  process.argv = [process.execPath, path.join(process.cwd(), 'fake-script.js'), ...(opts?.argv ?? [])];

  jest.resetModules();
  try {
    const mod: EnvModule = require('../src/env');
    return mod;
  } finally {
    process.env = originalEnv;
    process.argv = originalArgv;
  }
};

describe('env.ts', () => {
  test('defaults when nothing is set', () => {
    const mod = loadEnvModule();
    expect(mod.DEBUG_MODE).toBe(false);
    expect(mod.CONFIG_PATH).toBeUndefined();
    expect(mod.LOG_FILE).toBeUndefined();
  });

  test('reads DEBUG_MODE and LOG_FILE from the environment', () => {
    const mod = loadEnvModule({ env: { DEBUG_MODE: 'true', LOG_FILE: './logs/devices.log' } });
    expect(mod.DEBUG_MODE).toBe(true);
    expect(mod.LOG_FILE).toBe('./logs/devices.log');
  });

  test('CLI flags set CONFIG_PATH and override LOG_FILE', () => {
    const mod = loadEnvModule({
      env: { LOG_FILE: './from-env.log' },
      argv: ['--config', './conf/local.json', '--log-file', './run.log'],
    });

    expect(mod.CONFIG_PATH).toBe('./conf/local.json');
    expect(mod.LOG_FILE).toBe('./run.log');
  });

  test('DEBUG_MODE precedence: env then CLI (last wins)', () => {
    expect(loadEnvModule({ env: { DEBUG_MODE: 'false' }, argv: ['--debug'] }).DEBUG_MODE).toBe(true);
    expect(loadEnvModule({ env: { DEBUG_MODE: 'true' }, argv: ['--no-debug'] }).DEBUG_MODE).toBe(false);
    expect(loadEnvModule({ argv: ['--debug', '--no-debug'] }).DEBUG_MODE).toBe(false);
  });

  test('unknown CLI args and a dangling --config are ignored', () => {
    const mod = loadEnvModule({ argv: ['--wat', 'lol', '--config'] });
    expect(mod.CONFIG_PATH).toBeUndefined();
    expect(mod.LOG_FILE).toBeUndefined();
  });
});
