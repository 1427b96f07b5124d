/**
 * Shared routine behind every bulk mutation
 *
 * Selected torrents are fetched with the fields the admission check needs,
 * each one is admitted or rejected, the admitted ones are mutated with one
 * batched daemon call and then fetched again so the result shows their state
 * after the mutation.
 */

import { ClientResponse, error, info, respond, ResponseMessage } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { TorrentKey } from '../../domain/entities/TorrentFields';
import { ILogger, RpcArguments, RpcMethod } from '../../domain/interfaces';
import { RequestCoordinator, TorrentSelector } from './RequestCoordinator';

export interface Admission {
    admit: boolean;
    message?: string;
}

export type AdmissionCheck = (torrent: Torrent) => Admission;

export interface TorrentAction {
    method: RpcMethod;
    /** Fixed arguments sent along with the admitted IDs */
    args?: RpcArguments;
    /** Admits every torrent when omitted */
    check?: AdmissionCheck;
    checkKeys?: readonly TorrentKey[];
    returnKeys?: readonly TorrentKey[];
    /** False for actions after which the torrents no longer exist */
    refetch?: boolean;
}

const ALWAYS: readonly TorrentKey[] = ['id', 'name'];

const withIdentity = (keys: readonly TorrentKey[] = []): TorrentKey[] => [...new Set([...ALWAYS, ...keys])];

export class ActionOrchestrator {
    constructor(
        private readonly coordinator: RequestCoordinator,
        private readonly logger: ILogger
    ) { }

    /**
     * Succeeds if the daemon applied the action to at least one torrent
     */
    async run(selector: TorrentSelector, action: TorrentAction): Promise<ClientResponse<Torrent[]>> {
        const resolved = await this.coordinator.resolve(selector, withIdentity(action.checkKeys));
        if (!resolved.success) {
            return respond(false, [], resolved.messages);
        }

        const messages: ResponseMessage[] = [...resolved.messages];
        let admitted: Torrent[] = [];
        for (const torrent of resolved.result) {
            const { admit, message } = action.check ? action.check(torrent) : { admit: true, message: undefined };
            if (admit) {
                admitted.push(torrent);
            }
            if (message !== undefined) {
                messages.push(admit ? info(message) : error(message));
            }
        }

        if (admitted.length > 0) {
            const ids = admitted.map((torrent) => torrent.id);
            this.logger.info(`${action.method} on ${ids.length} torrent(s): ${ids.join(',')}`);
            const mutated = await this.coordinator.request(action.method, { ...action.args, ids });
            if (!mutated.success) {
                messages.push(...mutated.messages);
                admitted = [];
            }
        }

        if (admitted.length === 0) {
            return respond(false, [], messages);
        }
        if (action.refetch === false) {
            return respond(true, admitted, messages);
        }

        const refetched = await this.coordinator.getByIds(
            withIdentity(action.returnKeys),
            admitted.map((torrent) => torrent.id)
        );
        if (!refetched.success) {
            return respond(false, [], [...messages, ...refetched.messages]);
        }
        return respond(true, refetched.result, [...messages, ...refetched.messages]);
    }
}
