/**
 * Use case for limiting the up- or download rate of torrents
 *
 * Rates are strings like "500k", "1.5Mi" or "800kb" (bits); null or a rate of
 * zero or less removes the limit. "+=" and "-=" adjust each torrent's current
 * limit, counting an unlimited rate as 0 for "+=" and leaving it unlimited for
 * "-=". The daemon takes limits in whole kilobytes per second.
 */

import { ClientResponse, error, info, respond, ResponseMessage } from '../../domain/entities/ClientResponse';
import { Torrent } from '../../domain/entities/Torrent';
import { RateLimit, UNLIMITED } from '../../domain/entities/TorrentFields';
import { InputError } from '../../domain/errors';
import { RpcArguments } from '../../domain/interfaces';
import { Quantity } from '../../domain/value-objects/Quantity';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { RequestCoordinator, TorrentSelector } from '../services/RequestCoordinator';

export type RateDirection = 'up' | 'down';

export interface LimitRateRequest {
    torrents: TorrentSelector;
    direction: RateDirection;
    rate: string | null;
}

type Adjustment = '+=' | '-=' | null;

interface ParsedRate {
    adjustment: Adjustment;
    bytes: number;
}

const RATE = /^(\+=|-=)?\s*(.+)$/;

export function limitKey(direction: RateDirection): 'rate-limit-up' | 'rate-limit-down' {
    return direction === 'up' ? 'rate-limit-up' : 'rate-limit-down';
}

/**
 * Reads a rate string as bytes per second
 * @throws InputError for anything that is not a number with optional prefix and unit
 */
export function parseRate(rate: string): ParsedRate {
    const match = RATE.exec(rate.trim());
    if (!match) {
        throw new InputError(`Invalid rate: ${JSON.stringify(rate)}`);
    }
    const [, sign, amount] = match;
    const adjustment: Adjustment = sign === '+=' || sign === '-=' ? sign : null;
    const quantity = Quantity.parse(amount, { unit: 'B' });
    // A lower case "b" means bits
    const bytes = quantity.unit !== null && quantity.unit.startsWith('b') ? quantity.value / 8 : quantity.value;
    return { adjustment, bytes };
}

function limitArgs(direction: RateDirection, bytes: number | null): RpcArguments {
    if (bytes === null || bytes <= 0) {
        return { [`${direction}loadLimited`]: false };
    }
    return {
        [`${direction}loadLimited`]: true,
        [`${direction}loadLimit`]: Math.floor(bytes / 1000)
    };
}

function adjust(current: RateLimit, rate: ParsedRate): number | null {
    if (current === UNLIMITED) {
        return rate.adjustment === '-=' ? null : rate.bytes;
    }
    const result = rate.adjustment === '-=' ? current.value - rate.bytes : current.value + rate.bytes;
    return result > 0 ? result : null;
}

const formatLimit = (limit: RateLimit): string => (limit === UNLIMITED ? UNLIMITED : limit.withUnit);

export class LimitRateUseCase {
    constructor(
        private coordinator: RequestCoordinator,
        private orchestrator: ActionOrchestrator
    ) { }

    async execute(request: LimitRateRequest): Promise<ClientResponse<Torrent[]>> {
        let rate: ParsedRate | null;
        try {
            rate = request.rate === null ? null : parseRate(request.rate);
        } catch (err) {
            if (err instanceof InputError) {
                return respond(false, [], [error(err.message)]);
            }
            throw err;
        }

        if (rate === null || rate.adjustment === null) {
            const response = await this.apply(request.torrents, request.direction, rate === null ? null : rate.bytes);
            return this.report(request.direction, response, []);
        }

        const key = limitKey(request.direction);
        const resolved = await this.coordinator.resolve(request.torrents, [key]);
        if (!resolved.success) {
            return respond(false, [], resolved.messages);
        }

        // One call per distinct resulting limit
        const groups = new Map<number | null, number[]>();
        for (const torrent of resolved.result) {
            const target = adjust(torrent.get(key), rate);
            groups.set(target, [...(groups.get(target) ?? []), torrent.id]);
        }

        const torrents: Torrent[] = [];
        const messages: ResponseMessage[] = [...resolved.messages];
        for (const [target, ids] of groups) {
            const response = await this.apply(ids, request.direction, target);
            torrents.push(...response.result);
            messages.push(...response.messages);
        }
        return this.report(request.direction, respond(torrents.length > 0, torrents), messages);
    }

    private apply(torrents: TorrentSelector, direction: RateDirection, bytes: number | null): Promise<ClientResponse<Torrent[]>> {
        return this.orchestrator.run(torrents, {
            method: 'torrent-set',
            args: limitArgs(direction, bytes),
            returnKeys: [limitKey(direction)]
        });
    }

    private report(direction: RateDirection, response: ClientResponse<Torrent[]>, earlier: readonly ResponseMessage[]): ClientResponse<Torrent[]> {
        const limits = response.result.map((torrent) =>
            info(`Limited ${direction}load rate of ${torrent.name}: ${formatLimit(torrent.get(limitKey(direction)))}`));
        return respond(response.success, response.result, [...earlier, ...response.messages, ...limits]);
    }
}
