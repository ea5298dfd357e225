import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadRunConfig, parseBoolean, parsePort } from '../../src/config/RunConfig';
import { ConfigurationError } from '../../src/errors';

describe('RunConfig', () => {
  let root: string;

  beforeEach(async() => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'stackrun-config-'));
  });

  afterEach(async() => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('applies defaults for an empty environment', () => {
    const config = loadRunConfig({}, { projectRoot: root });

    expect(config.projectRoot).toBe(root);
    expect(config.projectName).toBe(path.basename(root));
    expect(config.backendPort).toBe(8000);
    expect(config.frontendPort).toBe(5173);
    expect(config.healthCheck).toEqual({
      enabled: true,
      timeoutMs: 30_000,
      intervalMs: 1_000,
      livenessPath: '/health/live',
      readinessPath: '/health/ready',
    });
    expect(config.stopGracePeriodMs).toBe(5_000);
    expect(config.logDir).toBe(path.resolve(os.tmpdir()));
    expect(config.logLevel).toBe('info');
    expect(config.stacks).toEqual({ python: 'auto', rust: 'auto', go: 'auto', node: 'auto', docker: 'auto' });
    expect(config.backendPriority).toEqual([ 'python', 'rust', 'go' ]);
    expect(config.python).toEqual({ dir: root, venv: path.join(root, 'venv') });
    expect(config.node).toEqual({ dir: root, packageManager: 'npm' });
    expect(config.overrides).toEqual({});
  });

  it('reads ports, timeouts and paths from the environment', () => {
    const config = loadRunConfig({
      BACKEND_PORT: '9000',
      FRONTEND_PORT: '3001',
      HEALTH_CHECK_ENABLED: 'no',
      HEALTH_CHECK_TIMEOUT: '5',
      HEALTH_LIVE_PATH: 'live',
      HEALTH_READY_PATH: '',
      PROJECT_NAME: 'shop',
      STACKRUN_LOG_DIR: 'logs',
      STACKRUN_LOG_LEVEL: 'DEBUG',
      ENABLE_DOCKER: 'false',
      ENABLE_GO: 'yes',
      BACKEND_PRIORITY: 'go, python,go',
    }, { projectRoot: root });

    expect(config.backendPort).toBe(9000);
    expect(config.frontendPort).toBe(3001);
    expect(config.healthCheck.enabled).toBe(false);
    expect(config.healthCheck.timeoutMs).toBe(5_000);
    expect(config.healthCheck.livenessPath).toBe('/live');
    expect(config.healthCheck.readinessPath).toBeUndefined();
    expect(config.projectName).toBe('shop');
    expect(config.logDir).toBe(path.join(root, 'logs'));
    expect(config.logLevel).toBe('debug');
    expect(config.stacks.docker).toBe('false');
    expect(config.stacks.go).toBe('true');
    expect(config.backendPriority).toEqual([ 'go', 'python' ]);
  });

  it('picks conventional python and node directories when present', async() => {
    await fs.mkdir(path.join(root, 'backend'));
    await fs.mkdir(path.join(root, 'web'));

    const config = loadRunConfig({ NODE_PACKAGE_MANAGER: 'pnpm' }, { projectRoot: root });

    expect(config.python.dir).toBe(path.join(root, 'backend'));
    expect(config.node.dir).toBe(path.join(root, 'web'));
    expect(config.node.packageManager).toBe('pnpm');
  });

  it.each([
    [ 'BACKEND_PORT', '0' ],
    [ 'BACKEND_PORT', '70000' ],
    [ 'FRONTEND_PORT', 'abc' ],
    [ 'HEALTH_CHECK_TIMEOUT', '-1' ],
    [ 'HEALTH_CHECK_ENABLED', 'maybe' ],
    [ 'ENABLE_NODE', 'sometimes' ],
    [ 'STACKRUN_LOG_LEVEL', 'loud' ],
    [ 'BACKEND_PRIORITY', 'python,cobol' ],
    [ 'NODE_PACKAGE_MANAGER', 'bun' ],
  ])('rejects %s=%s', (name, value) => {
    expect(() => loadRunConfig({ [name]: value }, { projectRoot: root })).toThrow(ConfigurationError);
  });

  it('loads per-runtime overrides from stackrun.json', async() => {
    await fs.writeFile(path.join(root, 'stackrun.json'), JSON.stringify({
      services: {
        python: { command: [ 'python', '-m', 'app' ], port: 8100, livenessPath: 'live', cwd: 'api' },
      },
    }));

    const config = loadRunConfig({}, { projectRoot: root });

    expect(config.overrides.python).toEqual({
      command: { executable: 'python', args: [ '-m', 'app' ] },
      cwd: 'api',
      port: 8100,
      livenessPath: '/live',
      readinessPath: undefined,
    });
  });

  it('rejects a shell string command in the override file', async() => {
    await fs.writeFile(path.join(root, 'stackrun.json'), JSON.stringify({
      services: { go: { command: 'go run .' }},
    }));

    expect(() => loadRunConfig({}, { projectRoot: root })).toThrow(/must be a non-empty array of strings/u);
  });

  it('rejects unknown runtimes in the override file', async() => {
    await fs.writeFile(path.join(root, 'stackrun.json'), JSON.stringify({ services: { java: {}}}));

    expect(() => loadRunConfig({}, { projectRoot: root })).toThrow(`${path.join(root, 'stackrun.json')}: unknown runtime 'java'`);
  });

  it('requires an explicitly named config file to exist', () => {
    expect(() => loadRunConfig({}, { projectRoot: root, configFile: 'missing.json' }))
      .toThrow(`Config file not found: ${path.join(root, 'missing.json')}`);
  });

  it('parses booleans and ports', () => {
    expect(parseBoolean('X', 'ON', false)).toBe(true);
    expect(parseBoolean('X', '0', true)).toBe(false);
    expect(parseBoolean('X', undefined, true)).toBe(true);
    expect(parsePort('PORT', ' 8080 ', 1)).toBe(8080);
    expect(() => parsePort('PORT', '80.5', 1)).toThrow('PORT must be an integer between 1 and 65535, got \'80.5\'');
  });
});
