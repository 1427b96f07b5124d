/**
 * Use case for removing torrents from the daemon
 */

import { ClientResponse } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { TorrentSelector } from '../services/RequestCoordinator';

export interface RemoveTorrentsRequest {
    torrents: TorrentSelector;
    // Also delete downloaded data
    deleteFiles?: boolean;
}

export class RemoveTorrentsUseCase {
    constructor(private orchestrator: ActionOrchestrator) { }

    execute(request: RemoveTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        const deleteFiles = request.deleteFiles ?? false;
        return this.orchestrator.run(request.torrents, {
            method: 'torrent-remove',
            args: { 'delete-local-data': deleteFiles },
            refetch: false,
            check: (torrent) => ({
                admit: true,
                message: deleteFiles
                    ? `Deleting ${torrent.name} (including files)`
                    : `Removing ${torrent.name} (keeping files)`
            })
        });
    }
}
