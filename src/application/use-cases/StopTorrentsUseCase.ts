/**
 * Use case for stopping torrents
 */

import { ClientResponse } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { TorrentSelector } from '../services/RequestCoordinator';

export interface StopTorrentsRequest {
    torrents: TorrentSelector;
}

export class StopTorrentsUseCase {
    constructor(private orchestrator: ActionOrchestrator) { }

    execute(request: StopTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        return this.orchestrator.run(request.torrents, {
            method: 'torrent-stop',
            checkKeys: ['status'],
            check: (torrent) => torrent.get('status').isStopped
                ? { admit: false, message: `Already stopped: ${torrent.name}` }
                : { admit: true, message: `Stopping ${torrent.name}` }
        });
    }
}
