/**
 * String with "smart" comparison for filtering
 *
 * Comparison is case-insensitive when the other string is all lower case.
 * When either side is all digits, ordering compares that number against the
 * other side's length ("abc" > "2" because it is longer than two characters).
 */

const DIGITS = /^\d+$/;

export class SmartString {
  readonly value: string;

  constructor(value: string) {
    // Combine diacritical marks so length counts what a reader sees
    this.value = value.normalize('NFC');
  }

  get length(): number {
    return [...this.value].length;
  }

  private operand(other: string): string {
    return other === other.toLowerCase() ? this.value.toLowerCase() : this.value;
  }

  eq(other: string): boolean {
    return this.operand(other) === other;
  }

  contains(other: string): boolean {
    return this.operand(other).includes(other);
  }

  compare(other: string): number {
    const self = this.operand(other);
    if (DIGITS.test(self)) {
      return Number(self) - [...other].length;
    }
    if (DIGITS.test(other)) {
      return [...self].length - Number(other);
    }
    if (self === other) {
      return 0;
    }
    return self < other ? -1 : 1;
  }

  lt(other: string): boolean { return this.compare(other) < 0; }
  le(other: string): boolean { return this.compare(other) <= 0; }
  gt(other: string): boolean { return this.compare(other) > 0; }
  ge(other: string): boolean { return this.compare(other) >= 0; }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
