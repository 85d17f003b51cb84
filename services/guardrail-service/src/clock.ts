import { randomUUID } from "node:crypto";

export type Clock = {
  now: () => Date;
};

export type IdGenerator = () => string;

export const systemClock: Clock = {
  now: () => new Date()
};

export const randomIds: IdGenerator = () => randomUUID();

/**
 * Clock whose time only moves when told to. Used by tests and the demo script
 * to walk break-glass overrides and approval windows past their expiry.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = "2024-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(value: Date | string): void {
    this.current = new Date(value).getTime();
  }
}

export function sequentialIds(prefix = "id"): IdGenerator {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${String(counter).padStart(4, "0")}`;
  };
}
