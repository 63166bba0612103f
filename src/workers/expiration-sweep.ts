/**
 * Expiration Sweep Worker
 * Runs the expiration sweep on a fixed interval inside the API process
 *
 * Runs never overlap: a tick that fires while a sweep is in flight
 * joins that sweep instead of starting another.
 */

import type { LifecycleService } from '@/services/index.js';
import type { Result, SweepReport } from '@/types/index.js';

// Node fires longer delays after 1 ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ExpirationSweepWorker {
  start(): void;
  stop(): void;
  runOnce(): Promise<Result<SweepReport>>;
  isRunning(): boolean;
}

export function createExpirationSweepWorker(deps: {
  lifecycleService: Pick<LifecycleService, 'deactivateExpiredMembers'>;
  intervalMs: number;
}): ExpirationSweepWorker {
  const { lifecycleService, intervalMs } = deps;

  if (!(intervalMs > 0 && intervalMs <= MAX_TIMER_DELAY_MS)) {
    throw new RangeError(
      `Sweep interval must be between 1 and ${MAX_TIMER_DELAY_MS} ms, got ${intervalMs}`
    );
  }

  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<Result<SweepReport>> | null = null;

  async function sweep(): Promise<Result<SweepReport>> {
    const result = await lifecycleService.deactivateExpiredMembers();
    if (result.success) {
      console.error(
        `Expiration sweep: ${result.data.deactivated.length} of ${result.data.evaluated} member(s) deactivated`
      );
    } else {
      console.error(
        `Expiration sweep ${result.error.code}: ${result.error.message}`,
        result.error.details
      );
    }
    return result;
  }

  function runOnce(): Promise<Result<SweepReport>> {
    if (inFlight === null) {
      inFlight = sweep().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  return {
    start(): void {
      if (timer !== null) {
        return;
      }
      timer = setInterval(() => {
        runOnce().catch((err: unknown) => {
          console.error('Expiration sweep crashed:', err);
        });
      }, intervalMs);
      timer.unref();
    },

    stop(): void {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
    },

    runOnce,

    isRunning(): boolean {
      return inFlight !== null;
    },
  };
}
