/**
 * Use case for starting stopped torrents
 */

import { ClientResponse } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { TorrentSelector } from '../services/RequestCoordinator';

export interface StartTorrentsRequest {
    torrents: TorrentSelector;
    // Start right away, ignoring the daemon's download queue
    force?: boolean;
}

export class StartTorrentsUseCase {
    constructor(private orchestrator: ActionOrchestrator) { }

    execute(request: StartTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        return this.orchestrator.run(request.torrents, {
            method: request.force ? 'torrent-start-now' : 'torrent-start',
            checkKeys: ['status'],
            check: (torrent) => torrent.get('status').isStopped
                ? { admit: true, message: `Starting ${torrent.name}` }
                : { admit: false, message: `Already started: ${torrent.name}` }
        });
    }
}
