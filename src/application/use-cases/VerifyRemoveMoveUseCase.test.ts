/**
 * Unit tests for VerifyTorrentsUseCase, RemoveTorrentsUseCase and MoveTorrentsUseCase
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMockLogger, FakeDaemon } from '../../__mocks__/transmission';
import { error, info } from '../../domain/entities/ClientResponse';
import { createUseCases, TorrentUseCases } from './index';

describe('Verify, remove and move', () => {
    let daemon: FakeDaemon;
    let useCases: TorrentUseCases;

    beforeEach(() => {
        daemon = new FakeDaemon();
        useCases = createUseCases(daemon, createMockLogger());
    });

    describe('VerifyTorrentsUseCase', () => {
        it('should skip torrents that are verifying or queued for it', async () => {
            daemon.addTorrent({ name: 'Ubuntu', status: 0 });
            daemon.addTorrent({ name: 'Debian', status: 1 });
            daemon.addTorrent({ name: 'Fedora', status: 2 });

            const response = await useCases.verify.execute({ torrents: null });

            expect(response.success).toBe(true);
            expect(response.messages).toEqual([
                info('Verifying Ubuntu'),
                error('Already queued for verification: Debian'),
                error('Already verifying: Fedora')
            ]);
            expect(daemon.callsTo('torrent-verify')).toEqual([{ method: 'torrent-verify', args: { ids: [1] } }]);
        });
    });

    describe('RemoveTorrentsUseCase', () => {
        beforeEach(() => {
            daemon.addTorrent({ name: 'Ubuntu' });
        });

        it('should keep files by default', async () => {
            const response = await useCases.remove.execute({ torrents: [1] });

            expect(response.success).toBe(true);
            expect(response.result.map((t) => t.id)).toEqual([1]);
            expect(response.messages).toEqual([info('Removing Ubuntu (keeping files)')]);
            expect(daemon.callsTo('torrent-remove')).toEqual([
                { method: 'torrent-remove', args: { 'delete-local-data': false, ids: [1] } }
            ]);
            expect(daemon.record(1)).toBeUndefined();
        });

        it('should not look up removed torrents again', async () => {
            await useCases.remove.execute({ torrents: [1], deleteFiles: true });

            expect(daemon.calls.map((call) => call.method)).toEqual(['torrent-get', 'torrent-remove']);
        });

        it('should say when files are deleted too', async () => {
            const response = await useCases.remove.execute({ torrents: [1], deleteFiles: true });

            expect(response.messages).toEqual([info('Deleting Ubuntu (including files)')]);
        });
    });

    describe('MoveTorrentsUseCase', () => {
        beforeEach(() => {
            daemon.addTorrent({ name: 'Ubuntu', downloadDir: '/downloads' });
            daemon.addTorrent({ name: 'Debian', downloadDir: '/data' });
        });

        it('should move torrents that are elsewhere', async () => {
            const response = await useCases.move.execute({ torrents: null, path: '/data' });

            expect(response.success).toBe(true);
            expect(response.result.map((t) => t.get('path').value)).toEqual(['/data']);
            expect(response.messages).toEqual([info('Moved to /data: Ubuntu'), error('Already in /data: Debian')]);
            expect(daemon.callsTo('torrent-set-location')).toEqual([
                { method: 'torrent-set-location', args: { move: true, location: '/data', ids: [1] } }
            ]);
            expect(daemon.callsTo('session-get')).toEqual([]);
        });

        it('should resolve relative paths against the download directory', async () => {
            const response = await useCases.move.execute({ torrents: [1], path: 'archive' });

            expect(response.messages).toEqual([info('Moved to /downloads/archive: Ubuntu')]);
            expect(daemon.record(1)?.downloadDir).toBe('/downloads/archive');
        });

        it('should fail without touching torrents if the download directory is unknown', async () => {
            daemon.failNext('session-get');

            const response = await useCases.move.execute({ torrents: [1], path: 'archive' });

            expect(response.success).toBe(false);
            expect(response.messages).toEqual([error('Connection refused')]);
            expect(daemon.callsTo('torrent-get')).toEqual([]);
        });
    });
});
