/**
 * Wires the client operations onto one daemon connection
 */

import { FilterParser, ILogger, IRpcTransport } from '../../domain/interfaces';
import { ActionOrchestrator } from '../services/ActionOrchestrator';
import { RequestCoordinator } from '../services/RequestCoordinator';
import { TorrentCache } from '../services/TorrentCache';
import { AddTorrentUseCase } from './AddTorrentUseCase';
import { AddTrackersUseCase } from './AddTrackersUseCase';
import { AnnounceTorrentsUseCase } from './AnnounceTorrentsUseCase';
import { LimitRateUseCase } from './LimitRateUseCase';
import { ListTorrentsUseCase } from './ListTorrentsUseCase';
import { MoveTorrentsUseCase } from './MoveTorrentsUseCase';
import { RemoveTorrentsUseCase } from './RemoveTorrentsUseCase';
import { RemoveTrackersUseCase } from './RemoveTrackersUseCase';
import { SetFilePriorityUseCase } from './SetFilePriorityUseCase';
import { StartTorrentsUseCase } from './StartTorrentsUseCase';
import { StopTorrentsUseCase } from './StopTorrentsUseCase';
import { ToggleTorrentsUseCase } from './ToggleTorrentsUseCase';
import { VerifyTorrentsUseCase } from './VerifyTorrentsUseCase';

export interface TorrentUseCases {
    coordinator: RequestCoordinator;
    list: ListTorrentsUseCase;
    add: AddTorrentUseCase;
    start: StartTorrentsUseCase;
    stop: StopTorrentsUseCase;
    toggle: ToggleTorrentsUseCase;
    verify: VerifyTorrentsUseCase;
    remove: RemoveTorrentsUseCase;
    move: MoveTorrentsUseCase;
    setFilePriority: SetFilePriorityUseCase;
    limitRate: LimitRateUseCase;
    addTrackers: AddTrackersUseCase;
    removeTrackers: RemoveTrackersUseCase;
    announce: AnnounceTorrentsUseCase;
}

export interface UseCaseOptions {
    filterParser?: FilterParser;
    // Seconds since the epoch; used for the manual announce cool-down
    clock?: () => number;
}

export function createUseCases(transport: IRpcTransport, logger: ILogger, options: UseCaseOptions = {}): TorrentUseCases {
    const coordinator = new RequestCoordinator(transport, logger, new TorrentCache(), options.filterParser);
    const orchestrator = new ActionOrchestrator(coordinator, logger);
    const start = new StartTorrentsUseCase(orchestrator);
    const stop = new StopTorrentsUseCase(orchestrator);

    return {
        coordinator,
        list: new ListTorrentsUseCase(coordinator),
        add: new AddTorrentUseCase(coordinator, logger),
        start,
        stop,
        toggle: new ToggleTorrentsUseCase(coordinator, start, stop),
        verify: new VerifyTorrentsUseCase(orchestrator),
        remove: new RemoveTorrentsUseCase(orchestrator),
        move: new MoveTorrentsUseCase(coordinator, orchestrator),
        setFilePriority: new SetFilePriorityUseCase(coordinator, orchestrator),
        limitRate: new LimitRateUseCase(coordinator, orchestrator),
        addTrackers: new AddTrackersUseCase(coordinator, orchestrator),
        removeTrackers: new RemoveTrackersUseCase(coordinator, orchestrator),
        announce: new AnnounceTorrentsUseCase(orchestrator, options.clock)
    };
}
