export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }
}

/** Always returns the same instant (tests, replaying a past day) */
export class FixedClock implements Clock {
  constructor(private readonly instant: Date) {}

  now(): Date {
    return new Date(this.instant.getTime())
  }
}
