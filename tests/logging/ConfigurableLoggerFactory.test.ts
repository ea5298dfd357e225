import type { Format } from 'logform';
import { describe, expect, it } from 'vitest';
import { ConfigurableLoggerFactory } from '../../src/logging/ConfigurableLoggerFactory';
import { createRunId, logContext } from '../../src/logging/LogContext';

const MESSAGE = Symbol.for('message');

class InspectableLoggerFactory extends ConfigurableLoggerFactory {
  public lineFormat(label: string): Format {
    return this.getFormat(label);
  }
}

function render(factory: InspectableLoggerFactory, label: string, message: string): unknown {
  const info = factory.lineFormat(label).transform({ level: 'info', message });
  if (typeof info === 'boolean') {
    throw new Error('Log line was filtered');
  }
  return info[MESSAGE];
}

describe('ConfigurableLoggerFactory', () => {
  it('renders timestamp, label, level and message', () => {
    const factory = new InspectableLoggerFactory('info', { silent: true });

    expect(render(factory, 'Orchestrator', 'Started python'))
      .toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[Orchestrator\] info: Started python$/u);
  });

  it('tags every line of a run with its run id', () => {
    const factory = new InspectableLoggerFactory('info', { silent: true });

    const line = logContext.run({ runId: 'abc12345' }, () => render(factory, 'Orchestrator', 'Stopping 2 service(s)...'));

    expect(line).toMatch(/^\S+ \[run:abc12345\] \[Orchestrator\] info: Stopping 2 service\(s\)\.\.\.$/u);
  });

  it('shortens path labels when showing locations', () => {
    const factory = new InspectableLoggerFactory('info', { silent: true, showLocation: true });

    expect(render(factory, 'src/supervisor/ProcessSupervisor', 'x')).toMatch(/ \[ProcessSupervisor\] info: x$/u);
  });

  it('creates loggers for every level', () => {
    const logger = new ConfigurableLoggerFactory('debug', { silent: true }).createLogger('Test');

    expect(() => logger.debug('quiet')).not.toThrow();
    expect(() => logger.error('quiet')).not.toThrow();
  });

  it('creates short run ids', () => {
    expect(createRunId()).toMatch(/^[\da-f]{8}$/u);
    expect(createRunId()).not.toBe(createRunId());
  });
});
