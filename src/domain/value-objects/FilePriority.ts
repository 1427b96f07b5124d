import { ProtocolError } from '../errors';

export type FilePriorityName = 'low' | 'normal' | 'high';

/** Priority tiers accepted when changing file priorities; "shun" marks files unwanted */
export type PriorityTier = FilePriorityName | 'shun';

export const PRIORITY_TIERS: readonly PriorityTier[] = ['low', 'normal', 'high', 'shun'];

const BY_CODE: ReadonlyMap<number, FilePriorityName> = new Map([[-1, 'low'], [0, 'normal'], [1, 'high']]);

export class FilePriority {
  private constructor(readonly name: FilePriorityName, readonly code: number) { }

  static fromCode(code: number): FilePriority {
    const name = BY_CODE.get(code);
    if (name === undefined) {
      throw new ProtocolError(`Invalid file priority: ${code}`);
    }
    return new FilePriority(name, code);
  }

  compare(other: FilePriority): number {
    return this.code - other.code;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.name;
  }
}

export function isPriorityTier(value: string): value is PriorityTier {
  return PRIORITY_TIERS.some((tier) => tier === value);
}
