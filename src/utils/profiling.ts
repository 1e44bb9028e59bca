import { TimerData, TimerResult } from '../types';

function elapsedSince(start: [number, number]): number {
  const [seconds, nanoseconds] = process.hrtime(start);
  return seconds * 1000 + nanoseconds / 1000000; // Convert to milliseconds
}

export function createTimer() {
  const timers = new Map<string, TimerData>();
  const running = new Set<string>();

  function requireTimer(name: string): TimerData {
    const timer = timers.get(name);
    if (!timer) {
      throw new Error(`Timer ${name} not started`);
    }
    return timer;
  }

  return {
    start(name: string): void {
      timers.set(name, {
        start: process.hrtime(),
        splits: [],
        lastDuration: timers.get(name)?.lastDuration, // Survives until the next stop
      });
      running.add(name);
    },

    split(name: string, label: string | null = null): number {
      const timer = requireTimer(name);
      const elapsed = elapsedSince(timer.start);
      timer.splits.push({ label, elapsed });
      return elapsed;
    },

    stop(name: string): TimerResult {
      const timer = requireTimer(name);
      const elapsed = elapsedSince(timer.start);
      timer.lastDuration = elapsed;
      running.delete(name);

      if (timer.splits.length === 0) {
        timer.splits.push({ label: null, elapsed });
      }

      return {
        total: elapsed,
        splits: timer.splits,
      };
    },

    getElapsed(name: string): number {
      const timer = timers.get(name);
      return timer ? elapsedSince(timer.start) : 0;
    },

    /**
     * Get the duration of the last completed run for this timer name.
     * Returns undefined if the timer has never been stopped.
     */
    getDuration(name: string): number | undefined {
      return timers.get(name)?.lastDuration;
    },

    isRunning(name: string): boolean {
      return running.has(name);
    },

    getActiveTimers(): string[] {
      return Array.from(running);
    },
  };
}

export type Timer = ReturnType<typeof createTimer>;
