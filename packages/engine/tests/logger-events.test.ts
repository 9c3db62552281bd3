import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '../utils/logger.js';
import { SimpleEventBus, createEvent } from '../types/events.js';
import { AnalyzerFaultError, errorMessage } from '../types/errors.js';

describe('createLogger', () => {
  it('writes scoped lines at or above the threshold', () => {
    const lines: string[] = [];
    const log = createLogger('Client', { level: 'warn', write: (line) => lines.push(line) });

    log.info('hidden');
    log.warn('Backing off', { waitMs: 10000 });
    log.error('Gave up');

    expect(lines).toEqual(['[Client:WARN] Backing off {"waitMs":10000}', '[Client:ERROR] Gave up']);
  });
});

describe('SimpleEventBus', () => {
  it('delivers events to subscribers of their type until unsubscribed', () => {
    const bus = new SimpleEventBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(handler, ['ProfileFetched']);

    const event = createEvent('ProfileFetched', { companyNumber: '00000001', companyName: 'EXAMPLE TRADING LTD' });
    bus.publish(event);
    bus.publish(createEvent('AnalysisRequested', { companyNumber: '00000001' }));
    unsubscribe();
    bus.publish(event);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(event);
    expect(event.eventId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('logs a throwing handler and still delivers to the rest', () => {
    const lines: string[] = [];
    const bus = new SimpleEventBus(createLogger('EventBus', { write: (line) => lines.push(line) }));
    const after = vi.fn();
    bus.subscribe(() => {
      throw new Error('observer down');
    });
    bus.subscribe(after);

    const event = createEvent('AnalysisRequested', { companyNumber: '00000001' });
    expect(() => bus.publish(event)).not.toThrow();

    expect(after).toHaveBeenCalledWith(event);
    expect(lines).toEqual([
      `[EventBus:WARN] Event handler failed {"type":"AnalysisRequested","eventId":"${event.eventId}","error":"observer down"}`,
    ]);
  });
});

describe('errors', () => {
  it('wraps an analyzer fault with its dimension', () => {
    const err = new AnalyzerFaultError('control_network', new Error('timeout'));
    expect(err.name).toBe('AnalyzerFaultError');
    expect(err.message).toBe('Analyzer control_network failed: timeout');
    expect(errorMessage('plain')).toBe('plain');
  });
});
