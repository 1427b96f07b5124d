/**
 * Use case for verifying downloaded data of torrents
 */

import { ClientResponse } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ActionOrchestrator, Admission } from '../services/ActionOrchestrator';
import { TorrentSelector } from '../services/RequestCoordinator';

export interface VerifyTorrentsRequest {
    torrents: TorrentSelector;
}

function checkVerifiable(torrent: Torrent): Admission {
    const status = torrent.get('status');
    if (!status.isVerifying) {
        return { admit: true, message: `Verifying ${torrent.name}` };
    }
    return status.isQueued
        ? { admit: false, message: `Already queued for verification: ${torrent.name}` }
        : { admit: false, message: `Already verifying: ${torrent.name}` };
}

export class VerifyTorrentsUseCase {
    constructor(private orchestrator: ActionOrchestrator) { }

    execute(request: VerifyTorrentsRequest): Promise<ClientResponse<Torrent[]>> {
        return this.orchestrator.run(request.torrents, {
            method: 'torrent-verify',
            checkKeys: ['status'],
            check: checkVerifiable
        });
    }
}
