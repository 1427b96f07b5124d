/**
 * Use case for removing trackers from torrents
 *
 * The daemon removes trackers by their per-torrent ID, so the tracker lists
 * are fetched first to find the IDs of matching URLs.
 */

import { ClientResponse, error, info, respond, ResponseMessage } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { Tracker } from '../../domain/entities/Tracker';
import { AnnounceUrl } from '../../domain/value-objects/AnnounceUrl';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';

export interface RemoveTrackersRequest {
    torrents: TorrentSelector;
    urls: readonly string[];
    // Let "example.org" match "http://tracker.example.org/announce"
    partialMatch?: boolean;
}

function matches(tracker: Tracker, url: string, partialMatch: boolean): boolean {
    const parsed = AnnounceUrl.tryParse(url);
    if (parsed && parsed.equals(tracker.announce)) {
        return true;
    }
    return partialMatch && tracker.announce.toString().includes(url);
}

export class RemoveTrackersUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private orchestrator: ActionOrchestrator
    ) { }

    async execute(request: RemoveTrackersRequest): Promise<ClientResponse<Torrent[]>> {
        const partialMatch = request.partialMatch ?? false;

        const resolved = await this.coordinator.resolve(request.torrents, ['name', 'trackers']);
        if (!resolved.success) {
            return respond(false, [], resolved.messages);
        }

        const messages: ResponseMessage[] = [...resolved.messages];
        const matchedUrls = new Set<string>();
        const removals: Array<{ torrent: Torrent; trackerIds: number[] }> = [];
        for (const torrent of resolved.result) {
            const trackerIds: number[] = [];
            for (const tracker of torrent.get('trackers')) {
                const hits = request.urls.filter((url) => matches(tracker, url, partialMatch));
                if (hits.length > 0) {
                    hits.forEach((url) => matchedUrls.add(url));
                    trackerIds.push(tracker.id);
                    messages.push(info(`${torrent.name}: Removing tracker: ${tracker.announce}`));
                }
            }
            if (trackerIds.length > 0) {
                removals.push({ torrent, trackerIds });
            }
        }

        for (const url of new Set(request.urls)) {
            if (!matchedUrls.has(url)) {
                messages.push(error(`No matching trackers found: '${url}'`));
            }
        }

        const torrents: Torrent[] = [];
        for (const { torrent, trackerIds } of removals) {
            const response = await this.orchestrator.run([torrent.id], {
                method: 'torrent-set',
                args: { trackerRemove: trackerIds },
                returnKeys: ['trackers']
            });
            torrents.push(...response.result);
            messages.push(...response.messages);
        }
        return respond(torrents.length > 0, torrents, messages);
    }
}
