/**
 * Time source abstraction so the escalation rules can be exercised without
 * wall-clock waits.
 */

export interface IClock {
  now(): Date;
}

export const systemClock: IClock = {
  now: () => new Date(),
};

/**
 * Manually advanced clock for tests and dry runs.
 */
export class ManualClock implements IClock {
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(at: Date): void {
    this.current = at.getTime();
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}
