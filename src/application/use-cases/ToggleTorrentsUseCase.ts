/**
 * Use case for starting stopped torrents and stopping running ones in one go
 */

import { ClientResponse, respond } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';
import { StartTorrentsUseCase } from './StartTorrentsUseCase';
import { StopTorrentsUseCase } from './StopTorrentsUseCase';

export interface ToggleTorrentsRequest {
    torrents: TorrentSelector;
    force?: boolean;
}

export class ToggleTorrentsUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private startTorrentsUseCase: StartTorrentsUseCase,
        private stopTorrentsUseCase: StopTorrentsUseCase
    ) { }

    async execute(request: ToggleTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        const resolved = await this.coordinator.resolve(request.torrents, ['status']);
        if (!resolved.success) {
            return respond(false, [], resolved.messages);
        }

        const stopped = resolved.result.filter((t) => t.get('status').isStopped).map((t) => t.id);
        const running = resolved.result.filter((t) => !t.get('status').isStopped).map((t) => t.id);

        const responses: ClientResponse<Torrent[]>[] = [];
        if (running.length > 0) {
            responses.push(await this.stopTorrentsUseCase.execute({ torrents: running }));
        }
        if (stopped.length > 0) {
            responses.push(await this.startTorrentsUseCase.execute({ torrents: stopped, force: request.force }));
        }

        const torrents = responses.flatMap((r) => r.result);
        return respond(torrents.length > 0, torrents, responses.flatMap((r) => r.messages));
    }
}
