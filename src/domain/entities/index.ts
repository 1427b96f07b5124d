export * from './ClientResponse';
export * from './Torrent';
export * from './TorrentFields';
export * from './TorrentFile';
export type { Tracker } from './Tracker';
