/**
 * Fetches torrents from the daemon into the shared cache
 *
 * Decides which daemon fields a request needs, keeps the one-time file list
 * fetch out of repeated requests and turns filters into ID sets.
 *
 * Operations only yield while awaiting the transport. Every cache merge or
 * purge happens synchronously between two awaits, so concurrent operations
 * interleave at network boundaries but never see a half-merged fetch.
 */

import path from 'path';
import { z } from 'zod';
import { ClientResponse, error, info, respond, ResponseMessage } from '../../domain/entities/ClientResponse';
import { RawTorrent, Torrent } from '../../domain/entities/Torrent';
import { KeySelection, wireFields } from '../../domain/entities/TorrentFields';
import { ArgumentError, asClientError, ProtocolError } from '../../domain/errors';
import {
    FilterParser,
    ILogger,
    IRpcTransport,
    isTorrentFilter,
    RpcArguments,
    RpcMethod,
    TorrentFileFilter,
    TorrentFilter
} from '../../domain/interfaces';
import { TorrentCache } from './TorrentCache';

/**
 * Which torrents an operation applies to: all of them (null/undefined), those
 * matching a filter or its textual form, or an explicit list of IDs
 */
export type TorrentSelector = TorrentFilter | string | readonly number[] | null | undefined;

const zTorrentList = z.object({
    torrents: z.array(z.object({ id: z.number().int() }).passthrough())
});

const zSession = z.object({ 'download-dir': z.string() });

function isIdList(value: unknown): value is readonly number[] {
    return Array.isArray(value) && value.every((id) => Number.isInteger(id));
}

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`;

export class RequestCoordinator {
    constructor(
        private readonly transport: IRpcTransport,
        private readonly logger: ILogger,
        readonly cache: TorrentCache = new TorrentCache(),
        private readonly filterParser?: FilterParser
    ) { }

    /**
     * Performs one daemon call; transport failures become a failed response
     */
    async request(method: RpcMethod, args: RpcArguments = {}): Promise<ClientResponse<Record<string, unknown>>> {
        try {
            const result = await this.transport.request(method, args);
            return respond(true, result);
        } catch (err) {
            const clientError = asClientError(err);
            if (!clientError) {
                throw err;
            }
            this.logger.warn(`${method} failed: ${clientError.message}`);
            return respond(false, {}, [error(clientError.message)]);
        }
    }

    /**
     * Resolves `location` against the daemon's default download directory
     * Absolute paths are returned without asking the daemon.
     */
    async absoluteDownloadPath(location: string): Promise<ClientResponse<string | null>> {
        if (path.posix.isAbsolute(location)) {
            return respond(true, location);
        }
        const response = await this.request('session-get');
        if (!response.success) {
            return respond(false, null, response.messages);
        }
        const session = zSession.safeParse(response.result);
        if (!session.success) {
            throw new ProtocolError('session-get response lacks download-dir');
        }
        return respond(true, path.posix.normalize(path.posix.join(session.data['download-dir'], location)));
    }

    /**
     * Unmodified torrent-get merged into the cache
     * @param fields - Daemon field names; "id" is always added
     * @param ids - Torrent IDs, or undefined for the full listing
     */
    async fetchRaw(fields: readonly string[], ids?: readonly number[]): Promise<ClientResponse<RawTorrent[]>> {
        if (ids !== undefined && ids.length === 0) {
            return respond(true, []);
        }

        const requested = fields.includes('id') ? [...fields] : ['id', ...fields];
        const args: Record<string, unknown> = { fields: requested };
        if (ids !== undefined) {
            args.ids = [...ids];
        }

        const response = await this.request('torrent-get', args);
        if (!response.success) {
            return respond(false, [], response.messages);
        }

        const parsed = zTorrentList.safeParse(response.result);
        if (!parsed.success) {
            throw new ProtocolError(`Malformed torrent-get response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
        }
        const records: RawTorrent[] = parsed.data.torrents;
        this.cache.merge(records);
        this.logger.debug(`Fetched ${plural(records.length, 'torrent')} with ${requested.length} fields`);
        return respond(true, records);
    }

    /**
     * Fetches `keys` for `ids` (every torrent if omitted)
     *
     * Without IDs the cache is purged against the full listing and succeeds
     * even when the daemon has no torrents. With IDs, every ID the daemon did
     * not return produces an error message. An empty ID list fetches nothing.
     */
    async getByIds(keys: KeySelection, ids?: readonly number[]): Promise<ClientResponse<Torrent[]>> {
        const fields = wireFields(keys);
        const wantsFiles = fields.includes('fileStats');

        // "files" only carries static data, so it is fetched once and then
        // kept up to date through "fileStats"
        if (wantsFiles && !this.filesInitialized(ids)) {
            this.logger.debug(`Initializing files for torrents: ${ids === undefined ? 'all' : ids.join(',')}`);
            const prepared = await this.fetchRaw(['files'], ids);
            if (!prepared.success) {
                return respond(false, [], prepared.messages);
            }
        }

        const response = await this.fetchRaw(fields, ids);
        if (!response.success) {
            return respond(false, [], response.messages);
        }
        const fetchedIds = response.result.map((record) => record.id);

        if (wantsFiles) {
            // Torrents that appeared between the two fetches
            const lacking = fetchedIds.filter((id) => !this.cache.get(id)?.hasField('files'));
            if (lacking.length > 0) {
                const completed = await this.fetchRaw(['files'], lacking);
                if (!completed.success) {
                    return respond(false, [], completed.messages);
                }
            }
        }

        if (ids === undefined) {
            const removed = this.cache.purge(fetchedIds);
            if (removed.length > 0) {
                this.logger.debug(`Purged ${plural(removed.length, 'torrent')} from cache: ${removed.join(',')}`);
            }
            return respond(true, this.cache.select());
        }

        const fetched = new Set(fetchedIds);
        const torrents: Torrent[] = [];
        const messages: ResponseMessage[] = [];
        for (const id of new Set(ids)) {
            const torrent = fetched.has(id) ? this.cache.get(id) : undefined;
            if (torrent) {
                torrents.push(torrent);
            } else {
                messages.push(error(`No torrent with ID: ${id}`));
            }
        }
        return respond(torrents.length > 0, torrents, messages);
    }

    /**
     * Fetches the filter's needed keys for every torrent, applies the filter
     * and fetches `keys` for the matches only
     */
    async getByFilter(keys: KeySelection, filter?: TorrentFilter | string): Promise<ClientResponse<Torrent[]>> {
        if (filter === undefined) {
            this.logger.debug('Looking for all torrents');
            return this.getByIds(keys);
        }

        const compiled = typeof filter === 'string' ? this.torrentFilter(filter) : filter;
        this.logger.debug(`Looking for ${compiled} torrents`);

        const messages: ResponseMessage[] = [];
        let torrents: Torrent[] = [];
        const candidates = await this.getByIds(compiled.neededKeys);
        if (candidates.success) {
            const wantedIds = compiled.apply(candidates.result).map((torrent) => torrent.id);
            if (wantedIds.length > 0) {
                const response = await this.getByIds(keys, wantedIds);
                messages.push(...response.messages);
                torrents = response.result;
            }
        } else {
            messages.push(...candidates.messages);
        }

        const success = torrents.length > 0;
        messages.push(success
            ? info(`Found ${plural(torrents.length, `${compiled} torrent`)}`)
            : error(`No matching torrents: ${compiled}`));
        return respond(success, torrents, messages);
    }

    /**
     * Entry point for every operation that takes a torrent selection
     * @throws ArgumentError for selectors of an unsupported shape
     */
    async resolve(selector: TorrentSelector, keys: KeySelection): Promise<ClientResponse<Torrent[]>> {
        if (selector === undefined || selector === null) {
            return this.getByIds(keys);
        }
        if (typeof selector === 'string' || isTorrentFilter(selector)) {
            return this.getByFilter(keys, selector);
        }
        if (isIdList(selector)) {
            return this.getByIds(keys, selector);
        }
        throw new ArgumentError(`Invalid torrent selection: ${JSON.stringify(selector)}`);
    }

    private filesInitialized(ids?: readonly number[]): boolean {
        if (ids === undefined) {
            return this.cache.size > 0 && this.cache.fieldsInitialized('files');
        }
        return ids.every((id) => this.cache.has(id)) && this.cache.fieldsInitialized('files', ids);
    }

    /**
     * Compiles the textual form of a torrent filter
     * @throws ArgumentError if no filter parser was configured
     */
    torrentFilter(expression: string): TorrentFilter {
        return this.parser(expression).torrentFilter(expression);
    }

    fileFilter(expression: string): TorrentFileFilter {
        return this.parser(expression).fileFilter(expression);
    }

    private parser(expression: string): FilterParser {
        if (!this.filterParser) {
            throw new ArgumentError(`Cannot parse filter without a filter parser: ${JSON.stringify(expression)}`);
        }
        return this.filterParser;
    }
}
