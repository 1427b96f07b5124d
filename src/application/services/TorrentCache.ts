/**
 * Torrents of one daemon connection, keyed by ID
 *
 * Entries are only created or changed by merging fetched records and only
 * removed by purge(). Callers must pass the complete ID universe of a full
 * listing to purge(); a partial set evicts live torrents.
 */

import { Torrent, RawTorrent } from '../../domain/entities/Torrent';
import { ProtocolError } from '../../domain/errors';

function isRawTorrent(record: Readonly<Record<string, unknown>>): record is RawTorrent {
    return Number.isInteger(record.id);
}

export class TorrentCache {
    private readonly torrents = new Map<number, Torrent>();

    /**
     * Creates unseen torrents and overlays fields onto known ones
     * Nothing is merged if any record lacks an integer ID.
     */
    merge(records: readonly Readonly<Record<string, unknown>>[]): Torrent[] {
        const valid: RawTorrent[] = [];
        for (const record of records) {
            if (!isRawTorrent(record)) {
                throw new ProtocolError(`Torrent record without ID: ${JSON.stringify(record)}`);
            }
            valid.push(record);
        }

        return valid.map((record) => {
            const existing = this.torrents.get(record.id);
            if (existing) {
                existing.update(record);
                return existing;
            }
            const torrent = new Torrent(record);
            this.torrents.set(record.id, torrent);
            return torrent;
        });
    }

    /**
     * Removes every torrent whose ID is not in `keepIds`
     * @returns IDs that were removed
     */
    purge(keepIds: Iterable<number>): number[] {
        const keep = new Set(keepIds);
        const removed = [...this.torrents.keys()].filter((id) => !keep.has(id));
        removed.forEach((id) => this.torrents.delete(id));
        return removed;
    }

    /** All cached torrents, or the cached subset of `ids` in cache order */
    select(ids?: readonly number[]): Torrent[] {
        const all = [...this.torrents.values()];
        if (ids === undefined) {
            return all;
        }
        const wanted = new Set(ids);
        return all.filter((torrent) => wanted.has(torrent.id));
    }

    /**
     * Whether every cached torrent among `ids` (all cached torrents if omitted)
     * has received the daemon field `field`
     */
    fieldsInitialized(field: string, ids?: readonly number[]): boolean {
        return this.select(ids).every((torrent) => torrent.hasField(field));
    }

    get(id: number): Torrent | undefined {
        return this.torrents.get(id);
    }

    has(id: number): boolean {
        return this.torrents.has(id);
    }

    get size(): number {
        return this.torrents.size;
    }
}
