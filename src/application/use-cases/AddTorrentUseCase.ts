/**
 * Use case for adding a torrent
 * Accepts a local .torrent file, a 40 character info hash or a link the
 * daemon can fetch itself (magnet, http).
 */

import fs from 'fs';
import os from 'os';
import { z } from 'zod';
import { ClientResponse, error, info, respond } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { ProtocolError } from '../../domain/errors';
import { ILogger } from '../../domain/interfaces';
import { RequestCoordinator } from '../services/RequestCoordinator';

export interface AddTorrentRequest {
    torrent: string;
    // Add without starting
    stopped?: boolean;
    // Download directory; relative paths are relative to the daemon's default
    path?: string;
}

const INFO_HASH = /^[0-9a-f]{40}$/i;

const zAdded = z.object({ id: z.number().int(), name: z.string() });
const zAddResult = z.union([
    z.object({ 'torrent-duplicate': zAdded }),
    z.object({ 'torrent-added': zAdded })
]);

function expandHome(file: string): string {
    return file === '~' || file.startsWith('~/') ? os.homedir() + file.slice(1) : file;
}

export class AddTorrentUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private logger: ILogger
    ) { }

    /**
     * The result holds the added (or already existing) torrent with "id" and "name"
     * @throws ProtocolError if the daemon reports neither an added nor a duplicate torrent
     */
    async execute(request: AddTorrentRequest): Promise<ClientResponse<Torrent | null>> {
        const args: Record<string, unknown> = { paused: request.stopped ?? false };

        if (request.path !== undefined) {
            const location = await this.coordinator.absoluteDownloadPath(request.path);
            if (!location.success || location.result === null) {
                return respond(false, null, location.messages);
            }
            args['download-dir'] = location.result;
        }

        const localFile = expandHome(request.torrent);
        if (fs.existsSync(localFile)) {
            try {
                args.metainfo = (await fs.promises.readFile(localFile)).toString('base64');
            } catch (err) {
                const reason = err instanceof Error ? err.message : String(err);
                this.logger.warn(`Cannot read torrent file ${localFile}: ${reason}`);
                return respond(false, null, [error(`Cannot read torrent file: ${localFile}`)]);
            }
        } else if (INFO_HASH.test(request.torrent)) {
            args.filename = `magnet:?xt=urn:btih:${request.torrent}`;
        } else {
            args.filename = request.torrent;
        }

        this.logger.info(`Adding torrent: ${request.torrent.substring(0, 80)}`);
        const response = await this.coordinator.request('torrent-add', args);
        if (!response.success) {
            const corrupt = response.messages.some((m) => /invalid or corrupt/i.test(m.text));
            return respond(false, null, corrupt
                ? [error(`Invalid or corrupt torrent: ${request.torrent}`)]
                : response.messages);
        }

        const parsed = zAddResult.safeParse(response.result);
        if (!parsed.success) {
            throw new ProtocolError(`Malformed torrent-add response: ${JSON.stringify(response.result)}`);
        }

        if ('torrent-duplicate' in parsed.data) {
            const { id, name } = parsed.data['torrent-duplicate'];
            return respond(false, new Torrent({ id, name }), [info(`Torrent already exists: ${name}`)]);
        }
        const { id, name } = parsed.data['torrent-added'];
        this.logger.info(`Torrent added successfully: ${name} (#${id})`);
        return respond(true, new Torrent({ id, name }), [info(`Added ${name}`)]);
    }
}
