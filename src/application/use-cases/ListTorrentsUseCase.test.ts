/**
 * Unit tests for ListTorrentsUseCase
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMockLogger, FakeDaemon } from '../../__mocks__/transmission';
import { ALL_KEYS } from '../../domain/entities/TorrentFields';
import { createUseCases, TorrentUseCases } from './index';

describe('ListTorrentsUseCase', () => {
    let daemon: FakeDaemon;
    let useCases: TorrentUseCases;

    beforeEach(() => {
        daemon = new FakeDaemon();
        daemon.addTorrent({ name: 'Ubuntu', files: [{ name: 'ubuntu.iso', length: 4000 }] });
        daemon.addTorrent({ name: 'Debian', trackers: ['http://tracker.example.org/announce'] });
        useCases = createUseCases(daemon, createMockLogger());
    });

    it('should return empty list when no torrents exist', async () => {
        daemon = new FakeDaemon();
        useCases = createUseCases(daemon, createMockLogger());

        const response = await useCases.list.execute();

        expect(response.success).toBe(true);
        expect(response.result).toEqual([]);
    });

    it('should fetch every key by default', async () => {
        const response = await useCases.list.execute();

        expect(response.result).toHaveLength(2);
        for (const torrent of response.result) {
            expect(torrent.keys()).toEqual(ALL_KEYS);
            ALL_KEYS.forEach((key) => torrent.get(key));
        }
    });

    it('should fetch only the requested keys', async () => {
        const response = await useCases.list.execute({ torrents: [2], keys: ['name', 'status'] });

        expect(response.result.map((t) => t.name)).toEqual(['Debian']);
        expect(daemon.calls).toEqual([
            { method: 'torrent-get', args: { fields: ['id', 'name', 'status'], ids: [2] } }
        ]);
    });
});
