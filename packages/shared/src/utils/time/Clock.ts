/**
 * Time source abstraction.
 *
 * Services read the current time through a Clock so that tests can pin it.
 */
export interface Clock {
  now(): number;
  date(): Date;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  date(): Date {
    return new Date(this.now());
  }
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private currentTime: number;

  constructor(startTime: number) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  date(): Date {
    return new Date(this.currentTime);
  }

  setTime(time: number): void {
    if (time < this.currentTime) {
      throw new Error(`Cannot move clock backwards: ${time} < ${this.currentTime}`);
    }
    this.currentTime = time;
  }

  advance(ms: number): void {
    this.setTime(this.currentTime + ms);
  }
}
