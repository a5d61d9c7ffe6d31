import { describe, it, expect, vi } from 'vitest';
import { GracefulShutdown } from '../../src/shutdown/graceful-shutdown.js';
import { ProcessSignalWatcher } from '../../src/shutdown/signal-watcher.js';
import { InMemoryProcessSignals } from '../../src/runtime/adapters/in-memory-process-signals.js';
import { ThrowingProcessTerminator } from '../../src/runtime/adapters/throwing-process-terminator.js';
import type { Closeable } from '../../src/shutdown/ports/closeable.js';
import { RecordingShutdownLogger } from '../helpers/recording-shutdown-logger.js';

function createHarness() {
  const signals = new InMemoryProcessSignals();
  const terminator = new ThrowingProcessTerminator();
  const shutdown = new GracefulShutdown(new ProcessSignalWatcher(signals), terminator);
  const logger = new RecordingShutdownLogger();
  return { signals, terminator, shutdown, logger };
}

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('GracefulShutdown', () => {
  describe('handle', () => {
    it('closes resources after an interrupt and reports a failure', async () => {
      const { signals, shutdown, logger } = createHarness();
      const a = { close: vi.fn() };
      const b = {
        close: vi.fn(() => {
          throw new Error('disk full');
        }),
      };

      const done = shutdown.handle(logger, a, b);
      signals.emit('SIGINT');

      await expect(done).resolves.toEqual({ kind: 'shutdown_completed', signal: 'interrupt' });
      expect(a.close).toHaveBeenCalledTimes(1);
      expect(b.close).toHaveBeenCalledTimes(1);
      expect(logger.transcript()).toEqual([
        'warn: system call receipt -> interrupt',
        'info: closing resources...',
        'info: trying to close resource 0',
        'info: trying to close resource 1',
        'error: error on close resource: disk full',
        'warn: system was terminated by a system call',
      ]);
    });

    it('does nothing until a signal arrives', async () => {
      const { shutdown, logger } = createHarness();
      const resource = { close: vi.fn() };
      let settled = false;

      void shutdown.handle(logger, resource).then(() => {
        settled = true;
      });
      await tick();

      expect(settled).toBe(false);
      expect(resource.close).not.toHaveBeenCalled();
      expect(logger.lines).toEqual([]);
    });

    it('still logs both bracketing lines with no resources', async () => {
      const { signals, shutdown, logger } = createHarness();

      const done = shutdown.handle(logger);
      signals.emit('SIGTERM');
      await done;

      expect(logger.transcript()).toEqual([
        'warn: system call receipt -> terminate',
        'info: closing resources...',
        'warn: system was terminated by a system call',
      ]);
    });

    it('passes the signal as a structured field on the receipt line', async () => {
      const { signals, shutdown, logger } = createHarness();

      const done = shutdown.handle(logger);
      signals.emit('SIGQUIT');
      await done;

      expect(logger.lines[0]).toEqual({
        level: 'warn',
        message: 'system call receipt -> quit',
        args: [{ signal: 'quit' }],
      });
    });

    it('yields the same completion value every time it is awaited', async () => {
      const { signals, shutdown, logger } = createHarness();

      const done = shutdown.handle(logger);
      signals.emit('SIGINT');
      const first = await done;
      const second = await done;

      expect(second).toBe(first);
    });

    it('closes resources in the order they were given', async () => {
      const { signals, shutdown, logger } = createHarness();
      const closed: string[] = [];
      const resource = (name: string, ms: number): Closeable => ({
        close: async () => {
          await new Promise((resolve) => setTimeout(resolve, ms));
          closed.push(name);
        },
      });

      const done = shutdown.handle(logger, resource('consumer', 15), resource('queue', 5), resource('connection', 0));
      signals.emit('SIGTERM');
      await done;

      expect(closed).toEqual(['consumer', 'queue', 'connection']);
    });

    it('processes one termination event even when signals keep arriving', async () => {
      const { signals, shutdown, logger } = createHarness();
      let release: () => void = () => undefined;
      const blocking: Closeable = {
        close: () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      };

      const done = shutdown.handle(logger, blocking);
      signals.emit('SIGINT');
      await tick();
      signals.emit('SIGINT');
      signals.emit('SIGTERM');
      release();
      await done;

      expect(logger.messagesAt('warn')).toEqual([
        'system call receipt -> interrupt',
        'system was terminated by a system call',
      ]);
    });

    it('does not fire twice when SIGQUIT is registered twice', async () => {
      const signals = new InMemoryProcessSignals();
      const shutdown = new GracefulShutdown(
        new ProcessSignalWatcher(signals, ['SIGTERM', 'SIGQUIT', 'SIGQUIT', 'SIGINT']),
        new ThrowingProcessTerminator()
      );
      const logger = new RecordingShutdownLogger();

      const done = shutdown.handle(logger);
      signals.emit('SIGQUIT');
      signals.emit('SIGQUIT');
      await done;

      expect(logger.transcript()).toEqual([
        'warn: system call receipt -> quit',
        'info: closing resources...',
        'warn: system was terminated by a system call',
      ]);
    });

    it('removes its signal listeners once finished', async () => {
      const { signals, shutdown, logger } = createHarness();

      const done = shutdown.handle(logger);
      expect(signals.listenerCount('SIGINT')).toBe(1);
      signals.emit('SIGINT');
      await done;

      expect(signals.listenerCount('SIGINT')).toBe(0);
      expect(signals.listenerCount('SIGTERM')).toBe(0);
      expect(signals.listenerCount('SIGQUIT')).toBe(0);
    });

    it('does not terminate the process', async () => {
      const { signals, shutdown, logger, terminator } = createHarness();
      const terminate = vi.spyOn(terminator, 'terminate');

      const done = shutdown.handle(logger);
      signals.emit('SIGTERM');
      await done;

      expect(terminate).not.toHaveBeenCalled();
    });
  });

  describe('handleAndTerminate', () => {
    it('runs the same sequence, then terminates with success', async () => {
      const { signals, shutdown, logger, terminator } = createHarness();
      const terminate = vi.spyOn(terminator, 'terminate');
      const a = { close: vi.fn() };
      const b = { close: vi.fn(() => Promise.reject(new Error('disk full'))) };

      const done = shutdown.handleAndTerminate(logger, a, b);
      signals.emit('SIGINT');

      await expect(done).rejects.toThrow('[ProcessTerminator] terminate(success)');
      expect(terminate).toHaveBeenCalledTimes(1);
      expect(terminate).toHaveBeenCalledWith({ kind: 'success' });
      expect(logger.transcript()).toEqual([
        'warn: system call receipt -> interrupt',
        'info: closing resources...',
        'info: trying to close resource 0',
        'info: trying to close resource 1',
        'error: error on close resource: disk full',
        'warn: system was terminated by a system call',
      ]);
    });

    it('terminates only after the last resource is closed', async () => {
      const { signals, shutdown, logger, terminator } = createHarness();
      const order: string[] = [];
      vi.spyOn(terminator, 'terminate').mockImplementation(() => {
        order.push('terminate');
        throw new Error('stopped');
      });
      const resource: Closeable = {
        close: async () => {
          await tick();
          order.push('closed');
        },
      };

      const done = shutdown.handleAndTerminate(logger, resource);
      signals.emit('SIGTERM');
      await expect(done).rejects.toThrow('stopped');

      expect(order).toEqual(['closed', 'terminate']);
    });

    it('removes its signal listeners before terminating', async () => {
      const { signals, shutdown, logger } = createHarness();

      const done = shutdown.handleAndTerminate(logger);
      signals.emit('SIGQUIT');
      await expect(done).rejects.toThrow();

      expect(signals.listenerCount('SIGQUIT')).toBe(0);
    });
  });
});
