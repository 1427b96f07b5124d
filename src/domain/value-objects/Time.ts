/**
 * Durations and points in time, both in seconds, with sentinel states
 */

const NOW_SECONDS = 5;
const DAY = 86400;
const UNITS: ReadonlyArray<readonly [string, number]> = [
  ['y', 31557600],
  ['M', 2592000],
  ['d', DAY],
  ['h', 3600],
  ['m', 60],
  ['s', 1]
];

export const nowSeconds = (): number => Date.now() / 1000;

export class Timedelta {
  static readonly NOT_APPLICABLE = -1;
  static readonly UNKNOWN = -2;

  constructor(readonly seconds: number) { }

  get isKnown(): boolean {
    return this.seconds >= 0;
  }

  toString(): string {
    if (this.seconds === Timedelta.UNKNOWN) {
      return '?';
    }
    if (this.seconds === Timedelta.NOT_APPLICABLE) {
      return '';
    }
    const abs = Math.abs(this.seconds);
    if (abs < NOW_SECONDS) {
      return 'now';
    }
    const [unit, amount] = UNITS.find(([, amount]) => abs >= amount) ?? UNITS[UNITS.length - 1];
    return `${Math.trunc(this.seconds / amount)}${unit}`;
  }

  toJSON(): number {
    return this.seconds;
  }
}

const pad = (n: number): string => String(n).padStart(2, '0');

export class Timestamp {
  static readonly NOT_APPLICABLE = -1;
  static readonly UNKNOWN = -2;

  constructor(readonly seconds: number) { }

  get isKnown(): boolean {
    // The daemon reports 0 for events that never happened
    return this.seconds > 0;
  }

  /** Time left until (or passed since, if negative) this timestamp */
  delta(now: number = nowSeconds()): Timedelta {
    return this.isKnown ? new Timedelta(Math.round(this.seconds - now)) : new Timedelta(this.seconds === Timestamp.UNKNOWN ? Timedelta.UNKNOWN : Timedelta.NOT_APPLICABLE);
  }

  /**
   * Local time within a day of `now`, date and time within two days, date otherwise
   */
  format(now: number = nowSeconds()): string {
    if (this.seconds === Timestamp.UNKNOWN) {
      return '?';
    }
    if (!this.isKnown) {
      return '';
    }
    const date = new Date(this.seconds * 1000);
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    const abs = Math.abs(this.seconds - now);
    if (abs <= DAY) {
      return time;
    }
    if (abs <= 2 * DAY) {
      return `${day} ${time}`;
    }
    return day;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): number {
    return this.seconds;
  }
}
