import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

import {
  createContextualLogger,
  createPrefixedLogger,
  createStructuredLogger,
  generateCorrelationId,
} from '../../../src/utils/logger';

let logSpy: MockInstance<typeof console.log>;
let warnSpy: MockInstance<typeof console.warn>;

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe('createPrefixedLogger', () => {
  it('prefixes every message', () => {
    const log = createPrefixedLogger('[Research]');

    log.info('Starting research');
    log.warn('Slow source');

    expect(logSpy).toHaveBeenCalledWith('[Research] Starting research');
    expect(warnSpy).toHaveBeenCalledWith('[Research] Slow source');
  });
});

describe('createStructuredLogger', () => {
  it('writes a readable line by default', () => {
    const log = createStructuredLogger('[Revision]');

    log.structured('info', { event: 'cycle_complete', revision: 2 });
    log.structured('warn', { event: 'gate_failed', message: 'Editor wants changes' });

    expect(logSpy).toHaveBeenCalledWith('[Revision] [cycle_complete] {"revision":2}');
    expect(warnSpy).toHaveBeenCalledWith('[Revision] [gate_failed]: Editor wants changes');
  });

  it('writes JSON lines when LOG_FORMAT=json', () => {
    vi.stubEnv('LOG_FORMAT', 'json');
    const log = createStructuredLogger('[Revision]');

    log.structured('info', { event: 'cycle_complete', revision: 2 });

    const line = logSpy.mock.calls[0][0];
    expect(typeof line).toBe('string');
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'info',
      module: 'Revision',
      event: 'cycle_complete',
      revision: 2,
    });
  });
});

describe('createContextualLogger', () => {
  it('tags lines with the correlation id', () => {
    const log = createContextualLogger('[Workflow]', { correlationId: 'run-1', topic: 'Tidal Power' });

    log.info('Starting');
    log.structured('info', { event: 'phase_complete', phase: 'research' });

    expect(logSpy).toHaveBeenCalledWith('[Workflow] [run-1] Starting');
    expect(logSpy).toHaveBeenCalledWith(
      '[Workflow] [run-1] [phase_complete] {"phase":"research","correlationId":"run-1"}'
    );
  });

  it('derives children that keep the correlation id', () => {
    const log = createContextualLogger('[Workflow]', { correlationId: 'run-1', topic: 'Tidal Power' });

    const child = log.child({ phase: 'review', correlationId: 'other' });

    expect(child.context).toEqual({ correlationId: 'run-1', topic: 'Tidal Power', phase: 'review' });
    child.info('Reviewing');
    expect(logSpy).toHaveBeenCalledWith('[Workflow] [run-1] Reviewing');
  });
});

describe('generateCorrelationId', () => {
  it('joins a base-36 timestamp and an 8-character suffix', () => {
    const id = generateCorrelationId();

    expect(id).toMatch(/^[0-9a-z]+-[0-9a-z]{8}$/);
    expect(generateCorrelationId()).not.toBe(id);
  });
});
