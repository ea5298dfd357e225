import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildDescriptor, createDefaultRegistry, serviceLogPath } from '../../src/registry/defaults';
import { isStackEnabled, markerFileDetector } from '../../src/registry/StackDetector';
import { makeConfig } from '../helpers/fixtures';

describe('registry defaults', () => {
  const config = makeConfig();

  it('builds the python backend with an argv command and PORT in its environment', () => {
    const descriptor = buildDescriptor('python', config);

    expect(descriptor).toEqual({
      name: 'python',
      runtime: 'python',
      role: 'backend',
      command: { executable: 'uvicorn', args: [ 'main:app', '--host', '0.0.0.0', '--port', '8000' ]},
      cwd: config.python.dir,
      port: 8000,
      livenessPath: '/health/live',
      readinessPath: '/health/ready',
      logPath: path.join(config.logDir, 'demo_python.log'),
      env: { PORT: '8000' },
      dependsOn: [],
      installHint: 'pip install uvicorn (inside the project virtualenv)',
    });
  });

  it('builds the node frontend on the frontend port with a dependency on the backend', () => {
    const descriptor = buildDescriptor('node', makeConfig({ frontendPort: 3000 }));

    expect(descriptor.role).toBe('frontend');
    expect(descriptor.command).toEqual({ executable: 'npm', args: [ 'run', 'dev', '--', '--port', '3000' ]});
    expect(descriptor.port).toBe(3000);
    expect(descriptor.livenessPath).toBe('/');
    expect(descriptor.readinessPath).toBeUndefined();
    expect(descriptor.dependsOn).toEqual([ 'backend' ]);
  });

  it('passes the port straight to pnpm and yarn', () => {
    const descriptor = buildDescriptor('node', makeConfig({ node: { dir: '/srv/web', packageManager: 'yarn' }}));

    expect(descriptor.command).toEqual({ executable: 'yarn', args: [ 'run', 'dev', '--port', '5173' ]});
    expect(descriptor.cwd).toBe('/srv/web');
  });

  it('builds go, rust and docker commands', () => {
    expect(buildDescriptor('go', config).command).toEqual({ executable: 'go', args: [ 'run', '.' ]});
    expect(buildDescriptor('rust', config).command).toEqual({ executable: 'cargo', args: [ 'run' ]});
    const docker = buildDescriptor('docker', config);
    expect(docker.command).toEqual({ executable: 'docker', args: [ 'compose', 'up' ]});
    expect(docker.role).toBe('docker');
  });

  it('applies overrides on top of the defaults', () => {
    const descriptor = buildDescriptor('go', makeConfig({
      overrides: {
        go: { command: { executable: 'air', args: []}, cwd: 'api', port: 8081, readinessPath: '/ready' },
      },
    }));

    expect(descriptor.command).toEqual({ executable: 'air', args: []});
    expect(descriptor.cwd).toBe(path.resolve(config.projectRoot, 'api'));
    expect(descriptor.port).toBe(8081);
    expect(descriptor.env).toEqual({ PORT: '8081' });
    expect(descriptor.livenessPath).toBe('/health/live');
    expect(descriptor.readinessPath).toBe('/ready');
  });

  it('registers only enabled runtimes, in fixed order', () => {
    const detect = vi.fn((runtime: string) => runtime === 'node' || runtime === 'go');
    const registry = createDefaultRegistry(makeConfig({
      stacks: { python: 'true', rust: 'false', go: 'auto', node: 'auto', docker: 'auto' },
    }), detect);

    expect(registry.list().map((d) => d.name)).toEqual([ 'python', 'go', 'node' ]);
    expect(detect).toHaveBeenCalledTimes(3);
  });

  it('names log files after project and service', () => {
    expect(serviceLogPath(config, 'go')).toBe(path.join(config.logDir, 'demo_go.log'));
  });

  describe('markerFileDetector', () => {
    let root: string;

    beforeEach(async() => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'stackrun-detect-'));
    });

    afterEach(async() => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it('detects runtimes by marker files, including the frontend directory', async() => {
      await fs.writeFile(path.join(root, 'go.mod'), 'module demo\n');
      await fs.mkdir(path.join(root, 'frontend'));
      await fs.writeFile(path.join(root, 'frontend', 'package.json'), '{}');
      const detected = makeConfig({
        projectRoot: root,
        python: { dir: root, venv: path.join(root, 'venv') },
        node: { dir: path.join(root, 'frontend'), packageManager: 'npm' },
      });

      expect(markerFileDetector('go', detected)).toBe(true);
      expect(markerFileDetector('node', detected)).toBe(true);
      expect(markerFileDetector('python', detected)).toBe(false);
      expect(isStackEnabled('python', { ...detected, stacks: { ...detected.stacks, python: 'true' }}, markerFileDetector))
        .toBe(true);
    });
  });
});
