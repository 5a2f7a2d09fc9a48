export class PollTimeoutError extends Error {
  constructor() {
    super("timed out waiting for the condition");
    this.name = "PollTimeoutError";
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Checks `condition` right away, then every `intervalMs` until it holds or
 * `timeoutMs` has elapsed. The last sleep is cut short so one final check lands
 * on the deadline. Errors thrown by `condition` propagate.
 */
export async function pollImmediate(params: {
  intervalMs: number;
  timeoutMs: number;
  condition: () => Promise<boolean>;
}): Promise<void> {
  const deadline = Date.now() + params.timeoutMs;
  while (true) {
    if (await params.condition()) return;
    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new PollTimeoutError();
    await sleep(Math.min(params.intervalMs, remaining));
  }
}
