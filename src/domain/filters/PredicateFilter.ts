/**
 * Filters built in code from plain predicates
 */

import type { Torrent } from '../entities/Torrent';
import type { TorrentKey } from '../entities/TorrentFields';
import type { TorrentFile } from '../entities/TorrentFile';
import type { TorrentFileFilter, TorrentFilter } from '../interfaces/ITorrentFilter';
import type { StatusToken } from '../value-objects/Status';

export class PredicateFilter implements TorrentFilter {
  constructor(
    private readonly description: string,
    readonly neededKeys: readonly TorrentKey[],
    private readonly predicate: (torrent: Torrent) => boolean
  ) { }

  apply(torrents: readonly Torrent[]): Torrent[] {
    return torrents.filter((torrent) => this.predicate(torrent));
  }

  /** Torrents matching this filter and `other` */
  and(other: PredicateFilter): PredicateFilter {
    return new PredicateFilter(
      `${this.description}&${other.description}`,
      [...new Set([...this.neededKeys, ...other.neededKeys])],
      (torrent) => this.predicate(torrent) && other.predicate(torrent)
    );
  }

  toString(): string {
    return this.description;
  }
}

export function statusFilter(token: StatusToken): PredicateFilter {
  return new PredicateFilter(`status=${token}`, ['status'], (t) => t.get('status').token === token);
}

/** Case-insensitive unless `text` contains upper case letters */
export function nameFilter(text: string): PredicateFilter {
  return new PredicateFilter(`name~${text}`, ['name'], (t) => t.get('name').contains(text));
}

export class FilePredicateFilter implements TorrentFileFilter {
  constructor(
    private readonly description: string,
    private readonly predicate: (file: TorrentFile) => boolean
  ) { }

  apply(files: readonly TorrentFile[]): TorrentFile[] {
    return files.filter((file) => this.predicate(file));
  }

  toString(): string {
    return this.description;
  }
}

export function fileNameFilter(text: string): FilePredicateFilter {
  return new FilePredicateFilter(`name~${text}`, (f) => f.name.contains(text));
}
