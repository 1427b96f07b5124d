/**
 * Use case for moving torrent data to another directory
 */

import { ClientResponse, respond } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';

export interface MoveTorrentsRequest {
    torrents: TorrentSelector;
    // Relative paths are relative to the daemon's default download directory
    path: string;
}

export class MoveTorrentsUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private orchestrator: ActionOrchestrator
    ) { }

    async execute(request: MoveTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        const target = await this.coordinator.absoluteDownloadPath(request.path);
        if (!target.success || target.result === null) {
            return respond(false, [], target.messages);
        }
        const location = target.result;

        return this.orchestrator.run(request.torrents, {
            method: 'torrent-set-location',
            args: { move: true, location },
            checkKeys: ['path'],
            returnKeys: ['path'],
            check: (torrent) => torrent.get('path').value === location
                ? { admit: false, message: `Already in ${location}: ${torrent.name}` }
                : { admit: true, message: `Moved to ${location}: ${torrent.name}` }
        });
    }
}
