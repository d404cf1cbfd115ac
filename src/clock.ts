/**
 * Clock
 *
 * Injectable time source plus ISO timestamp arithmetic. The scheduler and
 * handlers never read the wall clock directly.
 *
 * @module clock
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Manually advanced clock for tests and replays.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string | number = 0) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }

  set(time: Date | string | number): void {
    this.current = new Date(time).getTime();
  }
}

export function addMs(iso: string, ms: number): string {
  return new Date(new Date(iso).getTime() + ms).toISOString();
}

export function elapsedMs(fromIso: string, to: Date): number {
  return to.getTime() - new Date(fromIso).getTime();
}
