export type AttemptDecision<T> =
  | {
      action: "done";
      outcome: T;
    }
  | {
      action: "retry";
      delayMs: number;
      exhausted?: T; // outcome reported if this was the last allowed attempt
    };

export type DriveAttemptsOptions<T> = {
  maxAttempts: number;      // total tries, first one included
  exhausted: () => T;       // fallback outcome when attempts run out without a decision-specific one
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; outcome: T }) => void;
  sleepFn?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const normalizeDelay = (delayMs: number): number =>
  Number.isFinite(delayMs) && delayMs >= 0 ? delayMs : 0;

/**
 * Runs `attemptFn` with a 1-based attempt number until it returns a `done`
 * decision or `maxAttempts` is spent. A `retry` decision always sleeps its
 * delay before the attempt counter moves on, including after the last attempt.
 */
export const driveAttempts = async <T>(
  attemptFn: (attempt: number) => Promise<AttemptDecision<T>>,
  opts: DriveAttemptsOptions<T>
): Promise<T> => {
  const { maxAttempts, onRetry, onGiveUp, sleepFn = sleep } = opts;
  let giveUp = opts.exhausted;

  let attempt = 1;
  while (attempt <= maxAttempts) {
    const decision = await attemptFn(attempt);
    if (decision.action === "done") {
      return decision.outcome;
    }

    const delayMs = normalizeDelay(decision.delayMs);
    onRetry?.({ attempt, maxAttempts, delayMs });
    await sleepFn(delayMs);

    const { exhausted } = decision;
    giveUp = exhausted === undefined ? opts.exhausted : () => exhausted;
    attempt += 1;
  }

  const outcome = giveUp();
  onGiveUp?.({ attempt: attempt - 1, maxAttempts, outcome });
  return outcome;
};
