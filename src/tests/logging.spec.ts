import { describe, it, expect, afterEach } from 'vitest';
import { configureLogging, getLogger, memorySink } from '../logging/index.js';

function capture() {
  const sink = memorySink();
  configureLogging({ sink, level: 'info', quiet: false, logSteps: true });
  return sink;
}

describe('logging', () => {
  afterEach(() => {
    configureLogging({ sink: memorySink(), level: 'info', quiet: false, logSteps: true });
  });

  it('returns the same logger for the same name', () => {
    expect(getLogger('orders')).toBe(getLogger('orders'));
  });

  it('drops records below the configured level', () => {
    const sink = capture();
    configureLogging({ level: 'warn' });
    const log = getLogger('orders');
    log.info('loaded');
    log.warn('slow source', { ms: 1200 });
    expect(sink.records.map(r => [r.level, r.logger, r.message, r.fields])).toEqual([
      ['warn', 'orders', 'slow source', { ms: 1200 }],
    ]);
  });

  it('emits nothing when quiet', () => {
    const sink = capture();
    configureLogging({ quiet: true });
    getLogger('orders').error('failed');
    expect(sink.records).toEqual([]);
  });

  it('demotes step progress lines to debug when step logging is off', () => {
    const sink = capture();
    getLogger('orders').step('started');
    configureLogging({ logSteps: false, level: 'debug' });
    getLogger('orders').step('finished');
    expect(sink.records.map(r => [r.level, r.message])).toEqual([
      ['info', 'started'],
      ['debug', 'finished'],
    ]);
  });
});
