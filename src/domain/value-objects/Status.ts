/**
 * A torrent's lifecycle state with a fixed total order
 */

import { ProtocolError } from '../errors';

export const STATUS_ORDER = [
  'verifying',
  'verifying pending',
  'leeching',
  'leeching pending',
  'seeding',
  'seeding pending',
  'stopped'
] as const;

export type StatusToken = (typeof STATUS_ORDER)[number];

// Status codes as reported by the daemon
const STATUS_CODES: ReadonlyMap<number, StatusToken> = new Map([
  [0, 'stopped'],
  [1, 'verifying pending'],
  [2, 'verifying'],
  [3, 'leeching pending'],
  [4, 'leeching'],
  [5, 'seeding pending'],
  [6, 'seeding']
]);

function isStatusToken(value: string): value is StatusToken {
  return STATUS_ORDER.some((token) => token === value);
}

export class Status {
  private constructor(readonly token: StatusToken) { }

  static from(raw: string | number): Status {
    if (typeof raw === 'number') {
      const token = STATUS_CODES.get(raw);
      if (token === undefined) {
        throw new ProtocolError(`Invalid status code: ${raw}`);
      }
      return new Status(token);
    }
    if (!isStatusToken(raw)) {
      throw new ProtocolError(`Invalid status string: ${JSON.stringify(raw)}`);
    }
    return new Status(raw);
  }

  get index(): number {
    return STATUS_ORDER.indexOf(this.token);
  }

  get isStopped(): boolean {
    return this.token === 'stopped';
  }

  get isVerifying(): boolean {
    return this.token === 'verifying' || this.token === 'verifying pending';
  }

  get isQueued(): boolean {
    return this.token.endsWith(' pending');
  }

  compare(other: Status): number {
    return this.index - other.index;
  }

  toString(): string {
    return this.token;
  }

  toJSON(): string {
    return this.token;
  }
}
