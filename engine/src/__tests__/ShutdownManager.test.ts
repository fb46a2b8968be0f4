import { describe, it, expect, vi } from 'vitest';
import { ShutdownManager } from '../lifecycle/ShutdownManager.js';
import { capturingLogger } from './fakes.js';

describe('ShutdownManager', () => {
  it('runs handlers in registration order', async () => {
    const order: string[] = [];
    const shutdown = new ShutdownManager(capturingLogger().logger);
    shutdown.registerHandler('first', () => {
      order.push('first');
    });
    shutdown.registerHandler('second', async () => {
      order.push('second');
    });

    const report = await shutdown.executeHandlers(100);

    expect(order).toEqual(['first', 'second']);
    expect(report).toEqual({ completed: ['first', 'second'], failed: [], timedOut: [] });
    expect(shutdown.isShuttingDown()).toBe(false);
  });

  it('keeps going after a failing handler', async () => {
    const { logger, lines } = capturingLogger();
    const shutdown = new ShutdownManager(logger);
    shutdown.registerHandler('broken', () => {
      throw new Error('socket already closed');
    });
    shutdown.registerHandler('after', () => undefined);

    const report = await shutdown.executeHandlers(100);

    expect(report).toEqual({ completed: ['after'], failed: ['broken'], timedOut: [] });
    expect(lines).toContain('ERROR [restplay] Shutdown handler "broken" failed: socket already closed');
  });

  it('gives up on handlers that outlast the grace period', async () => {
    const shutdown = new ShutdownManager(capturingLogger().logger);
    shutdown.registerHandler('stuck', () => new Promise<void>(() => undefined));
    shutdown.registerHandler('quick', () => undefined);

    const report = await shutdown.executeHandlers(10);

    expect(report).toEqual({ completed: ['quick'], failed: [], timedOut: ['stuck'] });
  });

  it('fires the signal callback once and removes its listeners', () => {
    const onSignal = vi.fn();
    const before = process.listenerCount('SIGUSR2');
    const remove = ShutdownManager.setupSignalHandlers(onSignal, ['SIGUSR2']);

    process.emit('SIGUSR2', 'SIGUSR2');
    process.emit('SIGUSR2', 'SIGUSR2');
    remove();

    expect(onSignal).toHaveBeenCalledTimes(1);
    expect(onSignal).toHaveBeenCalledWith('SIGUSR2');
    expect(process.listenerCount('SIGUSR2')).toBe(before);
  });
});
