import fs from 'node:fs';
import path from 'node:path';
import type { RunConfig } from '../config/RunConfig';
import type { RuntimeKind } from './types';

/**
 * Decides whether a runtime with an `auto` toggle is present in the project.
 */
export type StackDetector = (runtime: RuntimeKind, config: RunConfig) => boolean;

const MARKERS: Record<RuntimeKind, readonly string[]> = {
  python: [ 'requirements.txt', 'pyproject.toml', 'setup.py', 'Pipfile' ],
  node: [ 'package.json' ],
  rust: [ 'Cargo.toml' ],
  go: [ 'go.mod' ],
  docker: [ 'docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml' ],
};

export const markerFileDetector: StackDetector = (runtime, config) => {
  const dirs = [ config.projectRoot ];
  if (runtime === 'python') {
    dirs.push(config.python.dir);
  } else if (runtime === 'node') {
    dirs.push(config.node.dir);
  }
  return dirs.some((dir) => MARKERS[runtime].some((marker) => fs.existsSync(path.join(dir, marker))));
};

export function isStackEnabled(runtime: RuntimeKind, config: RunConfig, detect: StackDetector): boolean {
  switch (config.stacks[runtime]) {
    case 'true': return true;
    case 'false': return false;
    default: return detect(runtime, config);
  }
}
