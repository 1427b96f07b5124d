/**
 * Unit tests for ActionOrchestrator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMockLogger, FakeDaemon } from '../../__mocks__/transmission';
import { errorTexts, info, error } from '../../domain/entities/ClientResponse';
import { IRpcTransport } from '../../domain/interfaces';
import { ActionOrchestrator, TorrentAction } from './ActionOrchestrator';
import { RequestCoordinator } from './RequestCoordinator';

const stop: TorrentAction = {
    method: 'torrent-stop',
    checkKeys: ['status'],
    check: (torrent) => torrent.get('status').isStopped
        ? { admit: false, message: `Already stopped: ${torrent.name}` }
        : { admit: true, message: `Stopping ${torrent.name}` }
};

describe('ActionOrchestrator', () => {
    let daemon: FakeDaemon;
    let orchestrator: ActionOrchestrator;

    const build = (transport: IRpcTransport): ActionOrchestrator => {
        const logger = createMockLogger();
        return new ActionOrchestrator(new RequestCoordinator(transport, logger), logger);
    };

    beforeEach(() => {
        daemon = new FakeDaemon();
        daemon.addTorrent({ name: 'Ubuntu', status: 0 });
        daemon.addTorrent({ name: 'Debian', status: 4 });
        orchestrator = build(daemon);
    });

    it('should mutate admitted torrents only and return them refetched', async () => {
        const response = await orchestrator.run(null, stop);

        expect(response.success).toBe(true);
        expect(response.result.map((t) => t.id)).toEqual([2]);
        expect(response.messages).toEqual([error('Already stopped: Ubuntu'), info('Stopping Debian')]);
        expect(daemon.calls).toEqual([
            { method: 'torrent-get', args: { fields: ['id', 'name', 'status'] } },
            { method: 'torrent-stop', args: { ids: [2] } },
            { method: 'torrent-get', args: { fields: ['id', 'name'], ids: [2] } }
        ]);
        expect(daemon.record(2)?.status).toBe(0);
    });

    it('should not call the daemon if nothing is admitted', async () => {
        const response = await orchestrator.run([1], stop);

        expect(response.success).toBe(false);
        expect(response.result).toEqual([]);
        expect(errorTexts(response)).toEqual(['Already stopped: Ubuntu']);
        expect(daemon.callsTo('torrent-stop')).toEqual([]);
    });

    it('should admit every torrent without a check', async () => {
        const response = await orchestrator.run([1, 2], { method: 'torrent-reannounce' });

        expect(response.success).toBe(true);
        expect(response.messages).toEqual([]);
        expect(daemon.callsTo('torrent-reannounce')).toEqual([{ method: 'torrent-reannounce', args: { ids: [1, 2] } }]);
    });

    it('should send fixed arguments with the IDs', async () => {
        await orchestrator.run([1], { method: 'torrent-remove', args: { 'delete-local-data': true }, refetch: false });

        expect(daemon.callsTo('torrent-remove')).toEqual([
            { method: 'torrent-remove', args: { 'delete-local-data': true, ids: [1] } }
        ]);
    });

    it('should return the admitted torrents without refetching when asked to', async () => {
        const response = await orchestrator.run([1], { method: 'torrent-remove', refetch: false });

        expect(response.success).toBe(true);
        expect(response.result.map((t) => t.id)).toEqual([1]);
        expect(daemon.callsTo('torrent-get')).toHaveLength(1);
    });

    it('should fail if the selection cannot be resolved', async () => {
        const response = await orchestrator.run([99], stop);

        expect(response.success).toBe(false);
        expect(errorTexts(response)).toEqual(['No torrent with ID: 99']);
        expect(daemon.callsTo('torrent-stop')).toEqual([]);
    });

    it('should keep the admission messages when the mutation fails', async () => {
        daemon.failNext('torrent-stop');

        const response = await orchestrator.run(null, stop);

        expect(response.success).toBe(false);
        expect(response.result).toEqual([]);
        expect(response.messages).toEqual([
            error('Already stopped: Ubuntu'),
            info('Stopping Debian'),
            error('Connection refused')
        ]);
        expect(daemon.callsTo('torrent-get')).toHaveLength(1);
    });

    it('should fail with every message when the refetch fails', async () => {
        const failingRefetch: IRpcTransport = {
            request: (method, args) => {
                if (method === 'torrent-stop') {
                    daemon.failNext('torrent-get');
                }
                return daemon.request(method, args);
            }
        };
        orchestrator = build(failingRefetch);

        const response = await orchestrator.run([2], stop);

        expect(response.success).toBe(false);
        expect(response.messages).toEqual([info('Stopping Debian'), error('Connection refused')]);
        expect(daemon.record(2)?.status).toBe(0);
    });

    it('should let concurrent runs both admit a torrent they saw before either mutated it', async () => {
        const [first, second] = await Promise.all([orchestrator.run([2], stop), orchestrator.run([2], stop)]);

        expect(first.messages).toEqual([info('Stopping Debian')]);
        expect(second.messages).toEqual([info('Stopping Debian')]);
        expect(daemon.callsTo('torrent-stop')).toHaveLength(2);
    });
});
