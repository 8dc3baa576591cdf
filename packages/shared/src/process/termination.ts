/**
 * Termination guards
 * Synchronous cleanup for state that must not outlive the process, run on
 * SIGINT/SIGTERM and on exit.
 */

const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Run `cleanup` if the process is told to terminate or exits while the guard is registered.
 * Returns the function that unregisters the guard without running `cleanup`.
 */
export function onTermination(cleanup: () => void): () => void {
  const handlers = new Map<NodeJS.Signals, () => void>();
  let released = false;

  const release = (): void => {
    if (released) return;
    released = true;
    for (const [signal, handler] of handlers) {
      process.removeListener(signal, handler);
    }
    process.removeListener('exit', onExit);
  };

  function onExit(): void {
    release();
    cleanup();
  }

  for (const signal of TERMINATION_SIGNALS) {
    const handler = (): void => {
      try {
        onExit();
      } finally {
        // With no listener left, default handling terminates the process
        process.kill(process.pid, signal);
      }
    };
    handlers.set(signal, handler);
    process.once(signal, handler);
  }
  process.once('exit', onExit);

  return release;
}
