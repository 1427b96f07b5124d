/**
 * Use case for listing torrents
 */

import { ClientResponse } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ALL, KeySelection } from '../../domain/entities/TorrentFields';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';

export interface ListTorrentsRequest {
    // All torrents if omitted
    torrents?: TorrentSelector;
    keys?: KeySelection;
}

export class ListTorrentsUseCase {
    constructor(
        private coordinator: RequestCoordinator
    ) { }

    execute(request: ListTorrentsRequest = {}): Promise<ClientResponse<Torrent[]>> {
        return this.coordinator.resolve(request.torrents, request.keys ?? ALL);
    }
}
