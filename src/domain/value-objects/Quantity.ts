/**
 * Numbers with a unit and metric/binary prefix formatting ("1.5Mi", "100kB")
 */

import { InputError } from '../errors';

export type PrefixSystem = 'metric' | 'binary';

const PREFIXES: Record<PrefixSystem, ReadonlyArray<readonly [string, number]>> = {
  binary: [['Ti', 1024 ** 4], ['Gi', 1024 ** 3], ['Mi', 1024 ** 2], ['Ki', 1024]],
  metric: [['T', 1000 ** 4], ['G', 1000 ** 3], ['M', 1000 ** 2], ['k', 1000]]
};

// Binary before metric so "ki" wins over "k"
const PREFIX_SIZES = new Map<string, number>(
  PREFIXES.binary.flatMap((binary, i) => [binary, PREFIXES.metric[i]])
    .map(([prefix, size]): [string, number] => [prefix.toLowerCase(), size])
);

const QUANTITY_REGEX = new RegExp(
  `^([-+]?\\d+(?:\\.\\d+)?) ?(${[...PREFIX_SIZES.keys()].join('|')}|)(.*?)$`,
  'i'
);

/**
 * Rounds to at most two significant decimals and drops trailing zeros
 */
export function prettyFloat(n: number): string {
  if (n === 0) {
    return '0';
  }
  const abs = Math.abs(n);
  let digits = 2;
  if (abs >= 100 || Number.isInteger(n)) {
    digits = 0;
  } else if (abs >= 10) {
    digits = 1;
  }
  const fixed = n.toFixed(digits);
  return digits > 0 ? fixed.replace(/\.?0+$/, '') : fixed;
}

export class Quantity {
  static readonly UNKNOWN = -1;
  static readonly NOT_AVAILABLE = -2;

  constructor(
    readonly value: number,
    readonly prefix: PrefixSystem = 'metric',
    readonly unit: string | null = null
  ) { }

  /**
   * Parses strings like "10", "10k", "1.5Mi" or "100kb"
   * A two-letter prefix selects binary formatting, a one-letter prefix metric.
   */
  static parse(input: string, defaults: { unit?: string; prefix?: PrefixSystem } = {}): Quantity {
    const match = QUANTITY_REGEX.exec(input.trim());
    if (!match) {
      throw new InputError(`Not a number: ${JSON.stringify(input)}`);
    }
    const [, numStr, prefixStr, unitStr] = match;
    let value = Number(numStr);
    let prefix = defaults.prefix ?? 'metric';
    if (prefixStr) {
      value *= PREFIX_SIZES.get(prefixStr.toLowerCase()) ?? 1;
      prefix = prefixStr.length === 2 ? 'binary' : 'metric';
    }
    return new Quantity(value, prefix, unitStr || defaults.unit || null);
  }

  get isUnknown(): boolean {
    return this.value === Quantity.UNKNOWN || this.value === Quantity.NOT_AVAILABLE;
  }

  get withoutUnit(): string {
    if (this.isUnknown) {
      return '?';
    }
    for (const [prefix, size] of PREFIXES[this.prefix]) {
      if (this.value >= size) {
        return prettyFloat(this.value / size) + prefix;
      }
    }
    return prettyFloat(this.value);
  }

  get withUnit(): string {
    if (this.isUnknown || this.unit === null) {
      return this.withoutUnit;
    }
    return this.withoutUnit + this.unit;
  }

  withValue(value: number): Quantity {
    return new Quantity(value, this.prefix, this.unit);
  }

  compare(other: Quantity): number {
    return this.value - other.value;
  }

  toString(): string {
    return this.withoutUnit;
  }

  toJSON(): number {
    return this.value;
  }
}

/** Constructors for the two quantities the daemon reports in bytes */
export const size = (bytes: number): Quantity => new Quantity(bytes, 'metric', 'B');
export const bandwidth = (bytesPerSecond: number): Quantity => new Quantity(bytesPerSecond, 'metric', 'B/s');

/** Number of seeders in a swarm; -1 when no tracker knows */
export const seedCount = (count: number): Quantity => new Quantity(count);

export class Percent {
  constructor(readonly value: number) { }

  toString(): string {
    return prettyFloat(this.value);
  }

  toJSON(): number {
    return this.value;
  }
}

export class Ratio {
  static readonly UNKNOWN = -1;
  static readonly INFINITE = -2;

  constructor(readonly value: number) { }

  toString(): string {
    if (this.value === Ratio.UNKNOWN) {
      return '?';
    }
    if (this.value === Ratio.INFINITE) {
      return '∞';
    }
    return prettyFloat(this.value);
  }

  toJSON(): number {
    return this.value;
  }
}
