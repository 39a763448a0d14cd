import { logger } from '../shared/logger.js';
import type { RunSupervisor } from './supervisor.js';

/**
 * Cancels the supervisor's run once timeoutMs elapses. Returns a disarm function;
 * a timeout of 0 arms nothing.
 */
export function armWatchdog(supervisor: RunSupervisor, timeoutMs: number): () => void {
  if (timeoutMs <= 0) return () => undefined;

  const timer = setTimeout(() => {
    if (supervisor.requestCancel()) {
      logger.warn({ timeoutMs }, 'run exceeded its deadline, cancelling');
    }
  }, timeoutMs);
  timer.unref();

  const unsubscribe = supervisor.subscribe({
    onComplete: () => disarm(),
  });

  function disarm(): void {
    clearTimeout(timer);
    unsubscribe();
  }

  return disarm;
}
