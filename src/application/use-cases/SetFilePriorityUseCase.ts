/**
 * Use case for changing the download priority of individual files
 *
 * File indexes differ per torrent, so every torrent gets its own call.
 */

import { ClientResponse, error, info, respond, ResponseMessage } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { TorrentFile } from '../../domain/entities/TorrentFile';
import { ArgumentError } from '../../domain/errors';
import { TorrentFileFilter } from '../../domain/interfaces';
import { PriorityTier, isPriorityTier } from '../../domain/value-objects/FilePriority';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';

export interface FileRef {
    torrentId: number;
    fileId: number;
}

/** A file filter or its textual form, explicit files, or null for all files */
export type FileSelector = TorrentFileFilter | string | readonly FileRef[] | null;

export interface SetFilePriorityRequest {
    torrents: TorrentSelector;
    priority: PriorityTier;
    files: FileSelector;
}

type FileSelection = (files: readonly TorrentFile[]) => TorrentFile[];

function isFileRefList(value: unknown): value is readonly FileRef[] {
    return Array.isArray(value) && value.every((ref: unknown) =>
        typeof ref === 'object' && ref !== null
        && 'torrentId' in ref && Number.isInteger(ref.torrentId)
        && 'fileId' in ref && Number.isInteger(ref.fileId));
}

const plural = (count: number): string => (count === 1 ? '' : 's');

export class SetFilePriorityUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private orchestrator: ActionOrchestrator
    ) { }

    async execute(request: SetFilePriorityRequest): Promise<ClientResponse<Torrent[]>> {
        if (!isPriorityTier(request.priority)) {
            return respond(false, [], [error(`Invalid priority: ${JSON.stringify(request.priority)}`)]);
        }
        const select = this.fileSelection(request.files);

        const resolved = await this.coordinator.resolve(request.torrents, ['name', 'files']);
        if (!resolved.success) {
            return respond(false, [], resolved.messages);
        }

        const messages: ResponseMessage[] = [];
        const changed: number[] = [];
        const byName = [...resolved.result].sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
        for (const torrent of byName) {
            const files = select(torrent.get('files'));
            if (request.files === null) {
                messages.push(info(`${files.length} file${plural(files.length)}: ${torrent.name}`));
            } else if (files.length === 0) {
                messages.push(error(`No matching files: ${torrent.name}`));
            } else {
                messages.push(info(`${files.length} matching file${plural(files.length)}: ${torrent.name}`));
            }
            if (files.length === 0) {
                continue;
            }

            const indexes = files.map((file) => file.id);
            const response = await this.orchestrator.run([torrent.id], {
                method: 'torrent-set',
                args: request.priority === 'shun'
                    ? { 'files-unwanted': indexes }
                    : { [`priority-${request.priority}`]: indexes, 'files-wanted': indexes }
            });
            messages.push(...response.messages);
            if (response.success) {
                changed.push(torrent.id);
            }
        }

        if (changed.length === 0) {
            return respond(false, [], messages);
        }
        const refetched = await this.coordinator.getByIds(['id', 'name', 'files'], changed);
        if (!refetched.success) {
            return respond(false, [], [...messages, ...refetched.messages]);
        }
        return respond(true, refetched.result, [...messages, ...refetched.messages]);
    }

    private fileSelection(files: FileSelector): FileSelection {
        if (files === null) {
            return (all) => [...all];
        }
        if (typeof files === 'string') {
            const filter = this.coordinator.fileFilter(files);
            return (all) => filter.apply(all);
        }
        if (isFileRefList(files)) {
            return (all) => all.filter((file) =>
                files.some((ref) => ref.torrentId === file.torrentId && ref.fileId === file.id));
        }
        if (typeof files === 'object' && 'apply' in files) {
            return (all) => files.apply(all);
        }
        throw new ArgumentError(`Invalid file selection: ${JSON.stringify(files)}`);
    }
}
