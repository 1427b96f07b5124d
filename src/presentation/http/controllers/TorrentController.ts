import { Request, Response } from 'express';
import { z } from 'zod';
import { TorrentUseCases } from '../../../application/use-cases';
import { FileSelector } from '../../../application/use-cases/SetFilePriorityUseCase';
import { TorrentSelector } from '../../../application/services/RequestCoordinator';
import { ClientResponse } from '../../../domain/entities/ClientResponse';
import { Torrent } from '../../../domain/entities/Torrent';
import { ALL, isTorrentKey, KeySelection } from '../../../domain/entities/TorrentFields';
import { fileNameFilter } from '../../../domain/filters/PredicateFilter';
import {
    toFilter,
    zAddTorrent,
    zFilePriority,
    zMove,
    zRateLimit,
    zRemove,
    zSelection,
    zSelector,
    zStart,
    zStatus,
    zTrackers
} from '../schemas';
import { renderResponse, renderTorrent } from '../utils/renderTorrent';

const zListQuery = z.object({
    status: zStatus.optional(),
    name: z.string().optional(),
    ids: z.string().regex(/^\d+(,\d+)*$/, 'Expected comma separated torrent IDs').optional(),
    keys: z.string().optional()
});

function toSelector(body: z.infer<typeof zSelector>): TorrentSelector {
    if (body === undefined || body === null) {
        return null;
    }
    return Array.isArray(body) ? body : toFilter(body);
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Validates `input` against `schema`; answers 400 and returns null if it does not match
 */
function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, res: Response): z.infer<S> | null {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        res.status(400).json({ error: describeIssues(parsed.error) });
        return null;
    }
    return parsed.data;
}

function send(res: Response, response: ClientResponse<Torrent[]>): void {
    res.status(response.success ? 200 : 422).json(renderResponse(response));
}

/**
 * Controller for handling torrent-related HTTP requests
 */
export class TorrentController {
    constructor(private useCases: TorrentUseCases) { }

    /**
     * Handles GET /torrents?status=...&name=...&ids=1,2&keys=name,status
     */
    async list(req: Request, res: Response): Promise<void> {
        const query = parse(zListQuery, req.query, res);
        if (!query) {
            return;
        }

        let keys: KeySelection = ALL;
        if (query.keys !== undefined) {
            const requested = query.keys.split(',');
            const unknown = requested.filter((key) => !isTorrentKey(key));
            if (unknown.length > 0) {
                res.status(400).json({ error: `Unknown keys: ${unknown.join(', ')}` });
                return;
            }
            keys = requested.filter(isTorrentKey);
        }

        const torrents: TorrentSelector = query.ids !== undefined
            ? query.ids.split(',').map(Number)
            : toFilter({ status: query.status, name: query.name || undefined });
        send(res, await this.useCases.list.execute({ torrents, keys }));
    }

    /**
     * Handles POST /torrents
     */
    async add(req: Request, res: Response): Promise<void> {
        const body = parse(zAddTorrent, req.body, res);
        if (!body) {
            return;
        }
        const response = await this.useCases.add.execute(body);
        res.status(response.success ? 201 : 422).json({
            success: response.success,
            torrent: response.result ? renderTorrent(response.result) : null,
            messages: response.messages
        });
    }

    /**
     * Handles DELETE /torrents
     */
    async remove(req: Request, res: Response): Promise<void> {
        const body = parse(zRemove, req.body, res);
        if (body) {
            send(res, await this.useCases.remove.execute({ torrents: toSelector(body.torrents), deleteFiles: body.deleteFiles }));
        }
    }

    async start(req: Request, res: Response): Promise<void> {
        const body = parse(zStart, req.body, res);
        if (body) {
            send(res, await this.useCases.start.execute({ torrents: toSelector(body.torrents), force: body.force }));
        }
    }

    async stop(req: Request, res: Response): Promise<void> {
        const body = parse(zSelection, req.body, res);
        if (body) {
            send(res, await this.useCases.stop.execute({ torrents: toSelector(body.torrents) }));
        }
    }

    async toggle(req: Request, res: Response): Promise<void> {
        const body = parse(zStart, req.body, res);
        if (body) {
            send(res, await this.useCases.toggle.execute({ torrents: toSelector(body.torrents), force: body.force }));
        }
    }

    async verify(req: Request, res: Response): Promise<void> {
        const body = parse(zSelection, req.body, res);
        if (body) {
            send(res, await this.useCases.verify.execute({ torrents: toSelector(body.torrents) }));
        }
    }

    async announce(req: Request, res: Response): Promise<void> {
        const body = parse(zSelection, req.body, res);
        if (body) {
            send(res, await this.useCases.announce.execute({ torrents: toSelector(body.torrents) }));
        }
    }

    async move(req: Request, res: Response): Promise<void> {
        const body = parse(zMove, req.body, res);
        if (body) {
            send(res, await this.useCases.move.execute({ torrents: toSelector(body.torrents), path: body.path }));
        }
    }

    /**
     * Handles POST /torrents/files/priority
     * `files` is a list of {torrentId, fileId}, {name} for matching file names, or null for all files
     */
    async setFilePriority(req: Request, res: Response): Promise<void> {
        const body = parse(zFilePriority, req.body, res);
        if (!body) {
            return;
        }
        let files: FileSelector = null;
        if (Array.isArray(body.files)) {
            files = body.files;
        } else if (body.files) {
            files = fileNameFilter(body.files.name);
        }
        send(res, await this.useCases.setFilePriority.execute({
            torrents: toSelector(body.torrents),
            priority: body.priority,
            files
        }));
    }

    async limitRate(req: Request, res: Response): Promise<void> {
        const body = parse(zRateLimit, req.body, res);
        if (body) {
            send(res, await this.useCases.limitRate.execute({
                torrents: toSelector(body.torrents),
                direction: body.direction,
                rate: body.rate
            }));
        }
    }

    async addTrackers(req: Request, res: Response): Promise<void> {
        const body = parse(zTrackers, req.body, res);
        if (body) {
            send(res, await this.useCases.addTrackers.execute({ torrents: toSelector(body.torrents), urls: body.urls }));
        }
    }

    async removeTrackers(req: Request, res: Response): Promise<void> {
        const body = parse(zTrackers, req.body, res);
        if (body) {
            send(res, await this.useCases.removeTrackers.execute({
                torrents: toSelector(body.torrents),
                urls: body.urls,
                partialMatch: body.partialMatch
            }));
        }
    }
}
