/**
 * Public API of the torrent client core
 */

export * from './domain/entities';
export * from './domain/errors';
export * from './domain/interfaces';
export * from './domain/filters/PredicateFilter';
export * from './domain/value-objects/AnnounceUrl';
export * from './domain/value-objects/FilePriority';
export * from './domain/value-objects/Quantity';
export * from './domain/value-objects/SmartString';
export * from './domain/value-objects/Status';
export * from './domain/value-objects/Time';
export { TorrentCache } from './application/services/TorrentCache';
export { RequestCoordinator } from './application/services/RequestCoordinator';
export type { TorrentSelector } from './application/services/RequestCoordinator';
export { ActionOrchestrator } from './application/services/ActionOrchestrator';
export type { Admission, AdmissionCheck, TorrentAction } from './application/services/ActionOrchestrator';
export { createUseCases } from './application/use-cases';
export type { TorrentUseCases, UseCaseOptions } from './application/use-cases';
export { TransmissionRpcTransport } from './infrastructure/transmission/TransmissionRpcTransport';
export type { TransmissionRpcOptions } from './infrastructure/transmission/TransmissionRpcTransport';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger';
export { FileLogger } from './infrastructure/logging/FileLogger';
export { CompositeLogger } from './infrastructure/logging/CompositeLogger';
