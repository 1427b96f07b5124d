/**
 * Unit tests for LimitRateUseCase
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMockLogger, FakeDaemon } from '../../__mocks__/transmission';
import { error, info } from '../../domain/entities/ClientResponse';
import { InputError } from '../../domain/errors';
import { createUseCases, TorrentUseCases } from './index';
import { limitKey, parseRate } from './LimitRateUseCase';

describe('parseRate', () => {
    it('should read absolute rates in bytes', () => {
        expect(parseRate('500k')).toEqual({ adjustment: null, bytes: 500000 });
    });

    it('should read adjustments', () => {
        expect(parseRate('+=100k')).toEqual({ adjustment: '+=', bytes: 100000 });
        expect(parseRate('-= 1M')).toEqual({ adjustment: '-=', bytes: 1000000 });
    });

    it('should convert bits to bytes', () => {
        expect(parseRate('800kb').bytes).toBe(100000);
    });

    it('should reject rates that are not numbers', () => {
        expect(() => parseRate('fast')).toThrow(InputError);
    });
});

describe('LimitRateUseCase', () => {
    let daemon: FakeDaemon;
    let useCases: TorrentUseCases;

    beforeEach(() => {
        daemon = new FakeDaemon();
        daemon.addTorrent({ name: 'Ubuntu', downloadLimited: true, downloadLimit: 200 });
        daemon.addTorrent({ name: 'Debian' });
        useCases = createUseCases(daemon, createMockLogger());
    });

    it('should map directions to keys', () => {
        expect(limitKey('up')).toBe('rate-limit-up');
        expect(limitKey('down')).toBe('rate-limit-down');
    });

    it('should set the same limit on every torrent in one call', async () => {
        const response = await useCases.limitRate.execute({ torrents: null, direction: 'down', rate: '500k' });

        expect(response.success).toBe(true);
        expect(daemon.callsTo('torrent-set').map((call) => call.args)).toEqual([
            { downloadLimited: true, downloadLimit: 500, ids: [1, 2] }
        ]);
        expect(response.messages).toEqual([
            info('Limited download rate of Ubuntu: 500kB/s'),
            info('Limited download rate of Debian: 500kB/s')
        ]);
    });

    it('should adjust each torrent relative to its current limit', async () => {
        const response = await useCases.limitRate.execute({ torrents: null, direction: 'down', rate: '+=100k' });

        expect(daemon.callsTo('torrent-set').map((call) => call.args)).toEqual([
            { downloadLimited: true, downloadLimit: 300, ids: [1] },
            { downloadLimited: true, downloadLimit: 100, ids: [2] }
        ]);
        expect(response.messages).toEqual([
            info('Limited download rate of Ubuntu: 300kB/s'),
            info('Limited download rate of Debian: 100kB/s')
        ]);
    });

    it('should remove limits that drop to zero and leave unlimited torrents unlimited', async () => {
        const response = await useCases.limitRate.execute({ torrents: null, direction: 'down', rate: '-=500k' });

        expect(daemon.callsTo('torrent-set').map((call) => call.args)).toEqual([
            { downloadLimited: false, ids: [1, 2] }
        ]);
        expect(response.messages).toEqual([
            info('Limited download rate of Ubuntu: unlimited'),
            info('Limited download rate of Debian: unlimited')
        ]);
    });

    it('should remove the limit for a null rate', async () => {
        await useCases.limitRate.execute({ torrents: [1], direction: 'up', rate: null });

        expect(daemon.callsTo('torrent-set').map((call) => call.args)).toEqual([{ uploadLimited: false, ids: [1] }]);
    });

    it('should take bit rates', async () => {
        await useCases.limitRate.execute({ torrents: [2], direction: 'up', rate: '800kb' });

        expect(daemon.callsTo('torrent-set').map((call) => call.args)).toEqual([
            { uploadLimited: true, uploadLimit: 100, ids: [2] }
        ]);
    });

    it('should fail without calling the daemon for rates that are not numbers', async () => {
        const response = await useCases.limitRate.execute({ torrents: null, direction: 'down', rate: 'fast' });

        expect(response.success).toBe(false);
        expect(response.result).toEqual([]);
        expect(response.messages).toEqual([error('Not a number: "fast"')]);
        expect(daemon.calls).toEqual([]);
    });

    it('should fail for unknown torrents', async () => {
        const response = await useCases.limitRate.execute({ torrents: [7], direction: 'down', rate: '+=1M' });

        expect(response.success).toBe(false);
        expect(daemon.callsTo('torrent-set')).toEqual([]);
    });
});
