import type { Clock, IdGenerator } from "../../src/utils/clock.js";

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = "2025-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function sequentialIds(prefix: string): IdGenerator {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
