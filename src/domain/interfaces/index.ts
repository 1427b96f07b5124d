/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './ILogger';
export * from './IRpcTransport';
export * from './ITorrentFilter';
