/**
 * Registry of torrent keys: which daemon fields each key is fetched with and
 * how the raw values become typed values
 */

import { z } from 'zod';
import { InputError, ProtocolError } from '../errors';
import { AnnounceUrl } from '../value-objects/AnnounceUrl';
import { FilePriority } from '../value-objects/FilePriority';
import { Percent, Quantity, Ratio, bandwidth, seedCount, size } from '../value-objects/Quantity';
import { SmartString } from '../value-objects/SmartString';
import { Status } from '../value-objects/Status';
import { Timedelta, Timestamp } from '../value-objects/Time';
import { TorrentFile } from './TorrentFile';
import type { Tracker } from './Tracker';

export const UNLIMITED = 'unlimited' as const;
export type RateLimit = Quantity | typeof UNLIMITED;

export interface TorrentValues {
  'id': number;
  'hash': string;
  'name': SmartString;
  'status': Status;
  'path': SmartString;
  'error': string;
  'ratio': Ratio;
  'private': boolean;
  'stalled': boolean;
  'isolated': boolean;
  '%downloaded': Percent;
  '%metadata': Percent;
  '%verified': Percent;
  'peers-connected': Quantity;
  'peers-uploading': Quantity;
  'peers-downloading': Quantity;
  'peers-seeding': Quantity;
  'rate-down': Quantity;
  'rate-up': Quantity;
  'rate-limit-down': RateLimit;
  'rate-limit-up': RateLimit;
  'size-final': Quantity;
  'size-total': Quantity;
  'size-downloaded': Quantity;
  'size-uploaded': Quantity;
  'size-available': Quantity;
  'size-corrupt': Quantity;
  'timestamp-created': Timestamp;
  'timestamp-added': Timestamp;
  'timestamp-started': Timestamp;
  'timestamp-active': Timestamp;
  'timestamp-done': Timestamp;
  'timespan-eta': Timedelta;
  'time-manual-announce-allowed': Timestamp;
  'trackers': readonly Tracker[];
  'files': readonly TorrentFile[];
}

export type TorrentKey = keyof TorrentValues;

/** Sentinel meaning "every supported key" */
export const ALL = 'ALL' as const;
export type KeySelection = typeof ALL | readonly TorrentKey[];

/** Wire name -> raw value of one torrent */
export type RawReader = (field: string) => unknown;

export interface FieldSpec<T> {
  /** Daemon fields to request for this key */
  readonly request: readonly string[];
  /** Daemon fields the conversion reads; defaults to `request` */
  readonly dependsOn?: readonly string[];
  convert(raw: RawReader, torrentId: number): T;
}

function read<T>(schema: z.ZodType<T>, raw: RawReader, field: string): T {
  const parsed = schema.safeParse(raw(field));
  if (!parsed.success) {
    throw new ProtocolError(`Missing or malformed torrent field '${field}'`);
  }
  return parsed.data;
}

const num = (raw: RawReader, field: string): number => read(z.number(), raw, field);
const str = (raw: RawReader, field: string): string => read(z.string(), raw, field);

function scalar<T>(field: string, convert: (raw: RawReader) => T): FieldSpec<T> {
  return { request: [field], convert };
}

const zRawFile = z.object({ name: z.string(), length: z.number() });
const zRawFileStats = z.object({ bytesCompleted: z.number(), wanted: z.boolean(), priority: z.number() });
const zRawTracker = z.object({
  id: z.number(),
  announce: z.string(),
  scrape: z.string().optional(),
  tier: z.number()
});
const zRawTrackerStats = z.array(z.object({
  seederCount: z.number(),
  hasAnnounced: z.boolean(),
  lastAnnounceSucceeded: z.boolean()
}));

function rateLimit(direction: 'up' | 'down'): FieldSpec<RateLimit> {
  const limited = `${direction}loadLimited`;
  const limit = `${direction}loadLimit`;
  return {
    request: [limited, limit],
    convert: (raw) => read(z.boolean(), raw, limited)
      ? bandwidth(num(raw, limit) * 1000) // daemon reports kilobytes per second
      : UNLIMITED
  };
}

function files(raw: RawReader, torrentId: number): TorrentFile[] {
  const statics = read(z.array(zRawFile), raw, 'files');
  const stats = read(z.array(zRawFileStats), raw, 'fileStats');
  if (statics.length !== stats.length) {
    throw new ProtocolError(`File list and file stats of torrent #${torrentId} differ in length`);
  }
  return statics.map((file, index) => {
    const slash = file.name.lastIndexOf('/');
    return new TorrentFile({
      torrentId,
      id: index,
      name: file.name.slice(slash + 1),
      path: slash >= 0 ? file.name.slice(0, slash) : '',
      sizeTotal: size(file.length),
      sizeDownloaded: size(stats[index].bytesCompleted),
      isWanted: stats[index].wanted,
      priority: FilePriority.fromCode(stats[index].priority)
    });
  });
}

function announceUrl(url: string): AnnounceUrl {
  try {
    return new AnnounceUrl(url);
  } catch (err) {
    if (err instanceof InputError) {
      throw new ProtocolError(`Daemon reported an invalid tracker URL: ${JSON.stringify(url)}`);
    }
    throw err;
  }
}

function trackers(raw: RawReader): Tracker[] {
  return read(z.array(zRawTracker), raw, 'trackers').map((trk) => {
    const announce = announceUrl(trk.announce);
    return {
      id: trk.id,
      tier: trk.tier,
      announce,
      scrape: trk.scrape ?? '',
      domain: announce.domain
    };
  });
}

/** Highest seeder count any tracker reported, -1 if none did */
function seeders(raw: RawReader): Quantity {
  const counts = read(zRawTrackerStats, raw, 'trackerStats').map((stat) => stat.seederCount);
  return seedCount(counts.length > 0 ? Math.max(...counts) : Quantity.UNKNOWN);
}

/**
 * Whether the torrent has no way to find peers: every tracker that was tried
 * failed (or there are none), and being private rules out DHT and PEX
 */
function isolated(raw: RawReader): boolean {
  const stats = read(zRawTrackerStats, raw, 'trackerStats');
  if (stats.length > 0 && (!stats.some((stat) => stat.hasAnnounced) || stats.some((stat) => stat.lastAnnounceSucceeded))) {
    return false;
  }
  return read(z.boolean(), raw, 'isPrivate');
}

export const TORRENT_FIELDS: { readonly [K in TorrentKey]: FieldSpec<TorrentValues[K]> } = {
  'id': scalar('id', (raw) => num(raw, 'id')),
  'hash': scalar('hashString', (raw) => str(raw, 'hashString')),
  'name': scalar('name', (raw) => new SmartString(str(raw, 'name'))),
  'status': scalar('status', (raw) => Status.from(read(z.union([z.number(), z.string()]), raw, 'status'))),
  'path': scalar('downloadDir', (raw) => new SmartString(str(raw, 'downloadDir'))),
  'error': scalar('errorString', (raw) => str(raw, 'errorString')),
  'ratio': scalar('uploadRatio', (raw) => new Ratio(num(raw, 'uploadRatio'))),
  'private': scalar('isPrivate', (raw) => read(z.boolean(), raw, 'isPrivate')),
  'stalled': scalar('isStalled', (raw) => read(z.boolean(), raw, 'isStalled')),
  'isolated': { request: ['isPrivate', 'trackerStats'], convert: isolated },
  '%downloaded': scalar('percentDone', (raw) => new Percent(num(raw, 'percentDone') * 100)),
  '%metadata': scalar('metadataPercentComplete', (raw) => new Percent(num(raw, 'metadataPercentComplete') * 100)),
  '%verified': scalar('recheckProgress', (raw) => new Percent(num(raw, 'recheckProgress') * 100)),
  'peers-connected': scalar('peersConnected', (raw) => new Quantity(num(raw, 'peersConnected'))),
  'peers-uploading': scalar('peersSendingToUs', (raw) => new Quantity(num(raw, 'peersSendingToUs'))),
  'peers-downloading': scalar('peersGettingFromUs', (raw) => new Quantity(num(raw, 'peersGettingFromUs'))),
  'peers-seeding': scalar('trackerStats', seeders),
  'rate-down': scalar('rateDownload', (raw) => bandwidth(num(raw, 'rateDownload'))),
  'rate-up': scalar('rateUpload', (raw) => bandwidth(num(raw, 'rateUpload'))),
  'rate-limit-down': rateLimit('down'),
  'rate-limit-up': rateLimit('up'),
  'size-final': scalar('sizeWhenDone', (raw) => size(num(raw, 'sizeWhenDone'))),
  'size-total': scalar('totalSize', (raw) => size(num(raw, 'totalSize'))),
  'size-downloaded': scalar('downloadedEver', (raw) => size(num(raw, 'downloadedEver'))),
  'size-uploaded': scalar('uploadedEver', (raw) => size(num(raw, 'uploadedEver'))),
  'size-available': scalar('desiredAvailable', (raw) => size(num(raw, 'desiredAvailable'))),
  'size-corrupt': scalar('corruptEver', (raw) => size(num(raw, 'corruptEver'))),
  'timestamp-created': scalar('dateCreated', (raw) => new Timestamp(num(raw, 'dateCreated'))),
  'timestamp-added': scalar('addedDate', (raw) => new Timestamp(num(raw, 'addedDate'))),
  'timestamp-started': scalar('startDate', (raw) => new Timestamp(num(raw, 'startDate'))),
  'timestamp-active': scalar('activityDate', (raw) => new Timestamp(num(raw, 'activityDate'))),
  'timestamp-done': scalar('doneDate', (raw) => new Timestamp(num(raw, 'doneDate'))),
  'timespan-eta': scalar('eta', (raw) => new Timedelta(num(raw, 'eta'))),
  'time-manual-announce-allowed': scalar('manualAnnounceTime', (raw) => new Timestamp(num(raw, 'manualAnnounceTime'))),
  'trackers': scalar('trackers', trackers),
  // The static file list is fetched once; later requests only carry the variable stats
  'files': { request: ['fileStats'], dependsOn: ['files', 'fileStats'], convert: files }
};

export function isTorrentKey(key: string): key is TorrentKey {
  return Object.prototype.hasOwnProperty.call(TORRENT_FIELDS, key);
}

export const ALL_KEYS: readonly TorrentKey[] = Object.keys(TORRENT_FIELDS).filter(isTorrentKey);

export function expandKeys(keys: KeySelection): readonly TorrentKey[] {
  return keys === ALL ? ALL_KEYS : keys;
}

/** Daemon fields needed to fetch `keys`; always includes "id" */
export function wireFields(keys: KeySelection): string[] {
  const fields = new Set<string>(['id']);
  for (const key of expandKeys(keys)) {
    TORRENT_FIELDS[key].request.forEach((field) => fields.add(field));
  }
  return [...fields];
}

export function dependencies(key: TorrentKey): readonly string[] {
  const spec = TORRENT_FIELDS[key];
  return spec.dependsOn ?? spec.request;
}
