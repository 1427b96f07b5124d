/**
 * Compiled filters consumed by the client core
 * Parsing of filter expressions lives outside the core; see FilterParser.
 */

import type { Torrent } from '../entities/Torrent';
import type { TorrentKey } from '../entities/TorrentFields';
import type { TorrentFile } from '../entities/TorrentFile';

export interface TorrentFilter {
  /** Keys `apply` reads; fetched before the filter runs */
  readonly neededKeys: readonly TorrentKey[];
  apply(torrents: readonly Torrent[]): Torrent[];
  toString(): string;
}

export interface TorrentFileFilter {
  apply(files: readonly TorrentFile[]): TorrentFile[];
  toString(): string;
}

/** Turns the textual form of a filter into a compiled one */
export interface FilterParser {
  torrentFilter(expression: string): TorrentFilter;
  fileFilter(expression: string): TorrentFileFilter;
}

export function isTorrentFilter(value: unknown): value is TorrentFilter {
  return typeof value === 'object' && value !== null
    && 'apply' in value && typeof value.apply === 'function'
    && 'neededKeys' in value && Array.isArray(value.neededKeys);
}
