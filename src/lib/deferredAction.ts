export interface GuardedActionOptions {
  delayMs: number;
  /** Queried when the timer fires; the action is dropped when it returns false. */
  isActive: () => boolean;
  run: () => void;
}

export type CancelGuardedAction = () => void;

export function scheduleGuardedAction({ delayMs, isActive, run }: GuardedActionOptions): CancelGuardedAction {
  let settled = false;

  const timerId = window.setTimeout(() => {
    if (settled) {
      return;
    }

    settled = true;
    if (!isActive()) {
      return;
    }

    run();
  }, delayMs);

  return () => {
    if (settled) {
      return;
    }

    settled = true;
    window.clearTimeout(timerId);
  };
}
