export type PollVerdict = "ready" | "pending" | "failed";

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  sleep: (ms: number) => Promise<void>;
  onPending?: (attempt: number) => void;
}

export interface PollResult {
  verdict: PollVerdict;
  attempts: number;
}

/**
 * Sleep, check, count; stops at the first "ready" or "failed" verdict or
 * after `maxAttempts` checks, whichever comes first.
 */
export async function poll(check: () => Promise<PollVerdict>, opts: PollOptions): Promise<PollResult> {
  let attempts = 0;
  while (attempts < opts.maxAttempts) {
    await opts.sleep(opts.intervalMs);
    attempts++;
    const verdict = await check();
    if (verdict !== "pending") {
      return { verdict, attempts };
    }
    opts.onPending?.(attempts);
  }
  return { verdict: "pending", attempts };
}
