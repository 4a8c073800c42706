import type { Logger } from 'pino';

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

function isPromiseLike(v: unknown): v is PromiseLike<unknown> {
  return typeof v === 'object' && v !== null && 'then' in v && typeof v.then === 'function';
}

/**
 * Runs a side effect whose outcome must not matter to the caller: a throw or a
 * rejection is logged at warn and dropped.
 */
export function fireAndForget(log: Logger, label: string, fn: () => unknown): void {
  const report = (err: unknown) => log.warn({ msg: 'side_effect_failed', label, error: normalizeError(err) });
  try {
    const out = fn();
    if (isPromiseLike(out)) {
      void Promise.resolve(out).catch(report);
    }
  } catch (err) {
    report(err);
  }
}
