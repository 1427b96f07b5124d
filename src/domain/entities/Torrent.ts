/**
 * One remote torrent as cached by the client
 *
 * Raw values are kept exactly as the daemon sent them. Typed values are
 * computed on first read and dropped again when any daemon field they were
 * computed from is overwritten. A torrent may hold only a few fields (e.g.
 * just "id" and "name" after a mutating call); identity is the ID alone.
 */

import {
  FieldSpec,
  TORRENT_FIELDS,
  TorrentKey,
  TorrentValues,
  dependencies,
  isTorrentKey
} from './TorrentFields';

export type RawTorrent = { readonly id: number } & Readonly<Record<string, unknown>>;

interface TypedSlot<T> {
  readonly value: T;
}

type TypedOverlay = { [K in TorrentKey]?: TypedSlot<TorrentValues[K]> };

export class Torrent {
  readonly id: number;
  private readonly raw = new Map<string, unknown>();
  private readonly typed: TypedOverlay = {};

  constructor(record: RawTorrent) {
    this.id = record.id;
    this.update(record);
  }

  /**
   * Overlays fields from a newer fetch; fields missing from `record` are kept
   */
  update(record: Readonly<Record<string, unknown>>): void {
    const changed = new Set(Object.keys(record));
    for (const field of changed) {
      this.raw.set(field, record[field]);
    }
    for (const key of Object.keys(this.typed).filter(isTorrentKey)) {
      if (dependencies(key).some((field) => changed.has(field))) {
        delete this.typed[key];
      }
    }
  }

  /** Whether the daemon field `field` has been received at least once */
  hasField(field: string): boolean {
    return this.raw.has(field);
  }

  rawValue(field: string): unknown {
    return this.raw.get(field);
  }

  get rawFields(): string[] {
    return [...this.raw.keys()];
  }

  /** Whether every daemon field `key` is computed from is present */
  has(key: TorrentKey): boolean {
    return dependencies(key).every((field) => this.raw.has(field));
  }

  /** Keys that can be read from this torrent */
  keys(): TorrentKey[] {
    return Object.keys(TORRENT_FIELDS).filter(isTorrentKey).filter((key) => this.has(key));
  }

  get<K extends TorrentKey>(key: K): TorrentValues[K] {
    const slot: TypedSlot<TorrentValues[K]> | undefined = this.typed[key];
    if (slot) {
      return slot.value;
    }
    const spec: FieldSpec<TorrentValues[K]> = TORRENT_FIELDS[key];
    const fresh: TypedSlot<TorrentValues[K]> = { value: spec.convert((field) => this.raw.get(field), this.id) };
    const typed: { [P in K]?: TypedSlot<TorrentValues[P]> } = this.typed;
    typed[key] = fresh;
    return fresh.value;
  }

  /** Same torrent, compared by ID only */
  sameAs(other: Torrent | number): boolean {
    return this.id === (typeof other === 'number' ? other : other.id);
  }

  get name(): string {
    return this.has('name') ? this.get('name').value : `#${this.id}`;
  }
}
