/**
 * Use case for asking trackers for more peers right away
 */

import { ClientResponse } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { nowSeconds } from '../../domain/value-objects/Time';
import { ActionOrchestrator, Admission } from '../services/ActionOrchestrator';
import { TorrentSelector } from '../services/RequestCoordinator';

export interface AnnounceTorrentsRequest {
    torrents: TorrentSelector;
}

export class AnnounceTorrentsUseCase {
    constructor(
        private orchestrator: ActionOrchestrator,
        private clock: () => number = nowSeconds
    ) { }

    execute(request: AnnounceTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        return this.orchestrator.run(request.torrents, {
            method: 'torrent-reannounce',
            checkKeys: ['status', 'trackers', 'time-manual-announce-allowed'],
            returnKeys: ['trackers'],
            check: (torrent) => this.check(torrent, this.clock())
        });
    }

    private check(torrent: Torrent, now: number): Admission {
        if (torrent.get('trackers').length < 1) {
            return { admit: false, message: `Torrent has no trackers: ${torrent.name}` };
        }
        if (torrent.get('status').isStopped) {
            return { admit: false, message: `Not announcing inactive torrent: ${torrent.name}` };
        }
        const allowed = torrent.get('time-manual-announce-allowed');
        if (allowed.isKnown && allowed.seconds > now) {
            return {
                admit: false,
                message: `Not allowing manual announce until ${allowed.format(now)} (in ${allowed.delta(now)}): ${torrent.name}`
            };
        }
        return { admit: true, message: `Announcing: ${torrent.name}` };
    }
}
