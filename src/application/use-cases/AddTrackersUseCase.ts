/**
 * Use case for adding announce URLs to torrents
 *
 * The daemon rejects a whole call if one of the URLs is already in use, so
 * URLs a torrent already has are reported and left out per torrent.
 */

import { ClientResponse, error, info, respond, ResponseMessage } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { InputError } from '../../domain/errors';
import { AnnounceUrl } from '../../domain/value-objects/AnnounceUrl';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';

export interface AddTrackersRequest {
    torrents: TorrentSelector;
    urls: readonly string[];
}

export class AddTrackersUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private orchestrator: ActionOrchestrator
    ) { }

    async execute(request: AddTrackersRequest): Promise<ClientResponse<Torrent[]>> {
        let urls: AnnounceUrl[];
        try {
            urls = request.urls.map((url) => new AnnounceUrl(url));
        } catch (err) {
            if (err instanceof InputError) {
                return respond(false, [], [error(err.message)]);
            }
            throw err;
        }

        const resolved = await this.coordinator.resolve(request.torrents, ['name', 'trackers']);
        if (!resolved.success) {
            return respond(false, [], resolved.messages);
        }

        const messages: ResponseMessage[] = [...resolved.messages];
        // Torrents that need the same URLs share one call
        const groups = new Map<string, { urls: AnnounceUrl[]; ids: number[] }>();
        for (const torrent of resolved.result) {
            const existing = torrent.get('trackers').map((tracker) => tracker.announce);
            const missing: AnnounceUrl[] = [];
            for (const url of urls) {
                if (existing.some((other) => other.equals(url)) || missing.some((other) => other.equals(url))) {
                    messages.push(error(`${torrent.name}: Tracker already exists: ${url}`));
                } else {
                    missing.push(url);
                    messages.push(info(`${torrent.name}: Adding tracker: ${url}`));
                }
            }
            if (missing.length > 0) {
                const key = missing.map((url) => url.normalized).join(' ');
                const group = groups.get(key) ?? { urls: missing, ids: [] };
                group.ids.push(torrent.id);
                groups.set(key, group);
            }
        }

        const torrents: Torrent[] = [];
        for (const group of groups.values()) {
            const response = await this.orchestrator.run(group.ids, {
                method: 'torrent-set',
                args: { trackerAdd: group.urls.map((url) => url.toString()) },
                returnKeys: ['trackers']
            });
            torrents.push(...response.result);
            messages.push(...response.messages);
        }
        return respond(torrents.length > 0, torrents, messages);
    }
}
