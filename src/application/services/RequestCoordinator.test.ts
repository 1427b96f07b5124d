/**
 * Unit tests for RequestCoordinator
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createMockLogger, FakeDaemon } from '../../__mocks__/transmission';
import { errorTexts, infoTexts } from '../../domain/entities/ClientResponse';
import { ArgumentError, ProtocolError } from '../../domain/errors';
import { fileNameFilter, nameFilter, statusFilter } from '../../domain/filters/PredicateFilter';
import { FilterParser, ILogger, IRpcTransport } from '../../domain/interfaces';
import { RequestCoordinator } from './RequestCoordinator';

describe('RequestCoordinator', () => {
    let daemon: FakeDaemon;
    let logger: ILogger;
    let coordinator: RequestCoordinator;

    beforeEach(() => {
        daemon = new FakeDaemon();
        logger = createMockLogger();
        coordinator = new RequestCoordinator(daemon, logger);
        daemon.addTorrent({ name: 'Ubuntu', status: 0, files: [{ name: 'ubuntu.iso', length: 4000 }] });
        daemon.addTorrent({ name: 'Debian', status: 4, files: [{ name: 'debian.iso', length: 3000 }] });
    });

    describe('request', () => {
        it('should turn transport failures into a failed response', async () => {
            daemon.failNext('session-get');

            const response = await coordinator.request('session-get');

            expect(response.success).toBe(false);
            expect(errorTexts(response)).toEqual(['Connection refused']);
            expect(logger.warn).toHaveBeenCalledWith('session-get failed: Connection refused');
        });

        it('should rethrow errors that are not client errors', async () => {
            daemon.failNext('session-get', new Error('boom'));

            await expect(coordinator.request('session-get')).rejects.toThrow('boom');
        });

        it('should treat an aborted call as a transport failure', async () => {
            const aborted = new Error('The operation was aborted');
            aborted.name = 'AbortError';
            daemon.failNext('session-get', aborted);

            const response = await coordinator.request('session-get');

            expect(response.success).toBe(false);
            expect(errorTexts(response)).toEqual(['The operation was aborted']);
        });
    });

    describe('fetchRaw', () => {
        it('should not call the daemon for an empty ID list', async () => {
            const response = await coordinator.fetchRaw(['name'], []);

            expect(response.success).toBe(true);
            expect(response.result).toEqual([]);
            expect(daemon.calls).toEqual([]);
        });

        it('should always request the ID', async () => {
            await coordinator.fetchRaw(['name'], [2]);

            expect(daemon.calls).toEqual([{ method: 'torrent-get', args: { fields: ['id', 'name'], ids: [2] } }]);
            expect(coordinator.cache.get(2)?.get('name').value).toBe('Debian');
        });

        it('should reject a malformed listing', async () => {
            const transport: IRpcTransport = { request: vi.fn().mockResolvedValue({ torrents: [{ name: 'no id' }] }) };
            coordinator = new RequestCoordinator(transport, logger);

            await expect(coordinator.fetchRaw(['name'])).rejects.toThrow(ProtocolError);
            expect(coordinator.cache.size).toBe(0);
        });
    });

    describe('getByIds', () => {
        it('should fetch every torrent without IDs', async () => {
            const response = await coordinator.getByIds(['name']);

            expect(response.success).toBe(true);
            expect(response.result.map((t) => t.name)).toEqual(['Ubuntu', 'Debian']);
            expect(daemon.calls).toEqual([{ method: 'torrent-get', args: { fields: ['id', 'name'] } }]);
        });

        it('should fail without a call for an empty ID list', async () => {
            const response = await coordinator.getByIds(['name'], []);

            expect(response.success).toBe(false);
            expect(response.result).toEqual([]);
            expect(response.messages).toEqual([]);
            expect(daemon.calls).toEqual([]);
        });

        it('should report IDs the daemon does not know', async () => {
            const response = await coordinator.getByIds(['name'], [1, 99]);

            expect(response.success).toBe(true);
            expect(response.result.map((t) => t.id)).toEqual([1]);
            expect(errorTexts(response)).toEqual(['No torrent with ID: 99']);
        });

        it('should fail if none of the IDs exist', async () => {
            const response = await coordinator.getByIds(['name'], [98, 99]);

            expect(response.success).toBe(false);
            expect(errorTexts(response)).toEqual(['No torrent with ID: 98', 'No torrent with ID: 99']);
        });

        it('should purge removed torrents on a full listing', async () => {
            await coordinator.getByIds(['name']);
            await daemon.request('torrent-remove', { ids: [2] });

            const response = await coordinator.getByIds(['name']);

            expect(response.result.map((t) => t.id)).toEqual([1]);
            expect(coordinator.cache.has(2)).toBe(false);
        });

        it('should show values the daemon changed since the last fetch', async () => {
            const first = await coordinator.getByIds(['status'], [1]);
            expect(first.result[0].get('status').token).toBe('stopped');
            daemon.patch(1, { status: 6 });

            const second = await coordinator.getByIds(['status'], [1]);

            expect(second.result[0]).toBe(first.result[0]);
            expect(second.result[0].get('status').token).toBe('seeding');
        });

        it('should not return cached torrents the daemon no longer has', async () => {
            await coordinator.getByIds(['name'], [2]);
            await daemon.request('torrent-remove', { ids: [2] });

            const response = await coordinator.getByIds(['name'], [2]);

            expect(response.success).toBe(false);
            expect(errorTexts(response)).toEqual(['No torrent with ID: 2']);
        });

        it('should fetch the file list once and then only file stats', async () => {
            await coordinator.getByIds(['files'], [1]);
            await coordinator.getByIds(['files'], [1]);

            expect(daemon.callsTo('torrent-get').map((call) => call.args)).toEqual([
                { fields: ['id', 'files'], ids: [1] },
                { fields: ['id', 'fileStats'], ids: [1] },
                { fields: ['id', 'fileStats'], ids: [1] }
            ]);
        });

        it('should fetch the file list of torrents that appear later', async () => {
            await coordinator.getByIds(['files']);
            const added = daemon.addTorrent({ name: 'Fedora', files: [{ name: 'fedora.iso', length: 2000 }] });

            const response = await coordinator.getByIds(['files']);

            expect(daemon.callsTo('torrent-get').map((call) => call.args)).toEqual([
                { fields: ['id', 'files'] },
                { fields: ['id', 'fileStats'] },
                { fields: ['id', 'fileStats'] },
                { fields: ['id', 'files'], ids: [added] }
            ]);
            expect(response.result.map((t) => t.get('files')[0].name.value)).toEqual(['ubuntu.iso', 'debian.iso', 'fedora.iso']);
        });

        it('should fail when the daemon cannot be reached', async () => {
            daemon.failNext('torrent-get');

            const response = await coordinator.getByIds(['name']);

            expect(response.success).toBe(false);
            expect(response.result).toEqual([]);
            expect(errorTexts(response)).toEqual(['Connection refused']);
        });
    });

    describe('getByFilter', () => {
        it('should fetch the filter keys first and the wanted keys for matches only', async () => {
            const response = await coordinator.getByFilter(['name'], statusFilter('stopped'));

            expect(response.success).toBe(true);
            expect(response.result.map((t) => t.id)).toEqual([1]);
            expect(infoTexts(response)).toEqual(['Found 1 status=stopped torrent']);
            expect(daemon.calls.map((call) => call.args)).toEqual([
                { fields: ['id', 'status'] },
                { fields: ['id', 'name'], ids: [1] }
            ]);
        });

        it('should count matches in the message', async () => {
            const response = await coordinator.getByFilter(['name'], nameFilter('n'));

            expect(infoTexts(response)).toEqual(['Found 2 name~n torrents']);
        });

        it('should name the filter when nothing matches', async () => {
            const response = await coordinator.getByFilter(['name'], nameFilter('arch'));

            expect(response.success).toBe(false);
            expect(response.result).toEqual([]);
            expect(errorTexts(response)).toEqual(['No matching torrents: name~arch']);
        });

        it('should pass on transport failures', async () => {
            daemon.failNext('torrent-get');

            const response = await coordinator.getByFilter(['name'], nameFilter('ubuntu'));

            expect(errorTexts(response)).toEqual(['Connection refused', 'No matching torrents: name~ubuntu']);
        });
    });

    describe('resolve', () => {
        it('should fetch everything for a null selector', async () => {
            const response = await coordinator.resolve(null, ['name']);

            expect(response.result).toHaveLength(2);
        });

        it('should compile textual filters with the configured parser', async () => {
            const parser: FilterParser = { torrentFilter: nameFilter, fileFilter: fileNameFilter };
            coordinator = new RequestCoordinator(daemon, logger, undefined, parser);

            const response = await coordinator.resolve('debian', ['name']);

            expect(response.result.map((t) => t.id)).toEqual([2]);
        });

        it('should reject textual filters without a parser', async () => {
            await expect(coordinator.resolve('debian', ['name'])).rejects.toThrow(ArgumentError);
        });

        it('should reject lists that are not torrent IDs', async () => {
            await expect(coordinator.resolve([1.5], ['name'])).rejects.toThrow(ArgumentError);
        });
    });

    describe('absoluteDownloadPath', () => {
        it('should keep absolute paths without asking the daemon', async () => {
            const response = await coordinator.absoluteDownloadPath('/data/iso');

            expect(response.result).toBe('/data/iso');
            expect(daemon.calls).toEqual([]);
        });

        it('should resolve relative paths against the default download directory', async () => {
            const response = await coordinator.absoluteDownloadPath('linux/../iso');

            expect(response.result).toBe('/downloads/iso');
            expect(daemon.callsTo('session-get')).toHaveLength(1);
        });
    });
});
