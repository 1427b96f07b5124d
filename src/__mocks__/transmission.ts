/**
 * In-process stand-in for a Transmission daemon
 * Keeps raw torrent records under their wire names and applies the RPC
 * methods the client uses to them.
 */

import { vi } from 'vitest';
import { z } from 'zod';
import { TransportError } from '../domain/errors';
import { ILogger, IRpcTransport, RpcArguments, RpcMethod } from '../domain/interfaces';

export type RawRecord = { id: number } & Record<string, unknown>;

export interface FakeCall {
  method: RpcMethod;
  args: RpcArguments;
}

export interface FakeFile {
  name: string;
  length: number;
  bytesCompleted?: number;
  wanted?: boolean;
  priority?: number;
}

export interface FakeTorrent {
  name: string;
  status?: number;
  downloadDir?: string;
  trackers?: string[];
  files?: FakeFile[];
  manualAnnounceTime?: number;
  downloadLimited?: boolean;
  downloadLimit?: number;
  uploadLimited?: boolean;
  uploadLimit?: number;
  percentDone?: number;
  isPrivate?: boolean;
  /** Seeder count every tracker reports; -1 for unknown */
  seeders?: number;
  /** Whether the trackers were announced to, and answered */
  announced?: boolean;
}

interface Swarm {
  seeders: number;
  announced: boolean;
}

const zGet = z.object({ fields: z.array(z.string()), ids: z.array(z.number()).optional() });
const zIds = z.object({ ids: z.array(z.number()) }).passthrough();
const zNumbers = z.array(z.number());
const zStrings = z.array(z.string());
const zTrackerList = z.array(z.object({ id: z.number(), announce: z.string(), tier: z.number() }));
const zStatList = z.array(z.object({ bytesCompleted: z.number(), wanted: z.boolean(), priority: z.number() }));

export function createMockLogger(): ILogger {
  return {
    log: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn()
  };
}

export class FakeDaemon implements IRpcTransport {
  readonly calls: FakeCall[] = [];
  downloadDir = '/downloads';
  private readonly torrents = new Map<number, RawRecord>();
  private readonly failures = new Map<RpcMethod, Error>();
  private readonly swarms = new Map<number, Swarm>();
  private nextId = 1;
  private nextTrackerId = 100;

  addTorrent(torrent: FakeTorrent): number {
    const id = this.nextId++;
    const files = torrent.files ?? [];
    this.torrents.set(id, {
      id,
      name: torrent.name,
      hashString: id.toString(16).padStart(40, '0'),
      status: torrent.status ?? 0,
      downloadDir: torrent.downloadDir ?? this.downloadDir,
      errorString: '',
      uploadRatio: 0,
      isPrivate: torrent.isPrivate ?? false,
      isStalled: false,
      percentDone: torrent.percentDone ?? 0,
      metadataPercentComplete: 1,
      recheckProgress: 0,
      peersConnected: 0,
      peersSendingToUs: 0,
      peersGettingFromUs: 0,
      rateDownload: 0,
      rateUpload: 0,
      downloadLimited: torrent.downloadLimited ?? false,
      downloadLimit: torrent.downloadLimit ?? 100,
      uploadLimited: torrent.uploadLimited ?? false,
      uploadLimit: torrent.uploadLimit ?? 100,
      sizeWhenDone: files.reduce((sum, f) => sum + f.length, 0),
      totalSize: files.reduce((sum, f) => sum + f.length, 0),
      downloadedEver: 0,
      uploadedEver: 0,
      desiredAvailable: 0,
      corruptEver: 0,
      dateCreated: 1690000000,
      addedDate: 1700000000,
      startDate: 1700000000,
      activityDate: 0,
      doneDate: 0,
      eta: -1,
      manualAnnounceTime: torrent.manualAnnounceTime ?? -1,
      trackers: (torrent.trackers ?? []).map((announce, tier) => ({ id: this.nextTrackerId++, announce, tier })),
      files: files.map((f) => ({ name: f.name, length: f.length, bytesCompleted: f.bytesCompleted ?? 0 })),
      fileStats: files.map((f) => ({ bytesCompleted: f.bytesCompleted ?? 0, wanted: f.wanted ?? true, priority: f.priority ?? 0 }))
    });
    this.swarms.set(id, { seeders: torrent.seeders ?? -1, announced: torrent.announced ?? false });
    return id;
  }

  record(id: number): RawRecord | undefined {
    return this.torrents.get(id);
  }

  /** Changes raw fields as if the daemon had updated the torrent on its own */
  patch(id: number, fields: Record<string, unknown>): void {
    const record = this.torrents.get(id);
    if (record) {
      Object.assign(record, fields);
    }
  }

  /** Makes the next call of `method` fail */
  failNext(method: RpcMethod, error: Error = new TransportError('Connection refused', 'connection')): void {
    this.failures.set(method, error);
  }

  callsTo(method: RpcMethod): FakeCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async request(method: RpcMethod, args: RpcArguments = {}): Promise<Record<string, unknown>> {
    this.calls.push({ method, args });
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }

    switch (method) {
      case 'session-get':
        return { 'download-dir': this.downloadDir, version: '4.0.5' };
      case 'torrent-get':
        return this.get(args);
      case 'torrent-add':
        return this.add(args);
      case 'torrent-stop':
        return this.each(args, (record) => { record.status = 0; });
      case 'torrent-start':
      case 'torrent-start-now':
        return this.each(args, (record) => { record.status = record.percentDone === 1 ? 6 : 4; });
      case 'torrent-verify':
        return this.each(args, (record) => { record.status = 2; });
      case 'torrent-reannounce':
        return this.each(args, () => undefined);
      case 'torrent-remove':
        return this.each(args, (record) => { this.torrents.delete(record.id); });
      case 'torrent-set-location':
        return this.each(args, (record) => { record.downloadDir = args.location; });
      case 'torrent-set':
        return this.each(args, (record) => this.set(record, args));
    }
  }

  private get(args: RpcArguments): Record<string, unknown> {
    const { fields, ids } = zGet.parse(args);
    const records = [...this.torrents.values()].filter((record) => ids === undefined || ids.includes(record.id));
    return {
      torrents: records.map((record) => {
        const projected: RawRecord = { id: record.id };
        fields.filter((field) => field in record).forEach((field) => { projected[field] = record[field]; });
        if (fields.includes('trackerStats')) {
          projected.trackerStats = this.trackerStats(record);
        }
        return projected;
      })
    };
  }

  // Derived from the tracker list so added and removed trackers show up
  private trackerStats(record: RawRecord): Record<string, unknown>[] {
    const swarm = this.swarms.get(record.id) ?? { seeders: -1, announced: false };
    return zTrackerList.parse(record.trackers).map((tracker) => ({
      id: tracker.id,
      announce: tracker.announce,
      seederCount: swarm.seeders,
      hasAnnounced: swarm.announced,
      lastAnnounceSucceeded: swarm.announced
    }));
  }

  private add(args: RpcArguments): Record<string, unknown> {
    const filename = typeof args.filename === 'string' ? args.filename : '';
    if (filename.includes('corrupt')) {
      throw new TransportError('invalid or corrupt torrent file', 'rejected');
    }
    const existing = [...this.torrents.values()].find((record) =>
      typeof record.hashString === 'string' && filename.includes(record.hashString));
    if (existing) {
      return { 'torrent-duplicate': { id: existing.id, name: existing.name, hashString: existing.hashString } };
    }
    const name = typeof args.metainfo === 'string' ? 'From metainfo' : filename.replace(/^.*[=/]/, '');
    const id = this.addTorrent({ name, status: args.paused === true ? 0 : 4, downloadDir: typeof args['download-dir'] === 'string' ? args['download-dir'] : undefined });
    return { 'torrent-added': { id, name, hashString: this.record(id)?.hashString } };
  }

  private each(args: RpcArguments, apply: (record: RawRecord) => void): Record<string, unknown> {
    const { ids } = zIds.parse(args);
    ids.forEach((id) => {
      const record = this.torrents.get(id);
      if (record) {
        apply(record);
      }
    });
    return {};
  }

  private set(record: RawRecord, args: RpcArguments): void {
    for (const field of ['downloadLimited', 'downloadLimit', 'uploadLimited', 'uploadLimit']) {
      if (field in args) {
        record[field] = args[field];
      }
    }
    if ('trackerAdd' in args) {
      const trackers = zTrackerList.parse(record.trackers);
      zStrings.parse(args.trackerAdd).forEach((announce) =>
        trackers.push({ id: this.nextTrackerId++, announce, tier: trackers.length }));
      record.trackers = trackers;
    }
    if ('trackerRemove' in args) {
      const remove = zNumbers.parse(args.trackerRemove);
      record.trackers = zTrackerList.parse(record.trackers).filter((tracker) => !remove.includes(tracker.id));
    }
    const stats = zStatList.parse(record.fileStats);
    for (const [key, value] of Object.entries(args)) {
      const indexes = zNumbers.safeParse(value);
      if (key === 'ids' || !indexes.success) {
        continue;
      }
      indexes.data.forEach((index) => {
        const stat = stats[index];
        if (key === 'files-wanted') stat.wanted = true;
        if (key === 'files-unwanted') stat.wanted = false;
        if (key === 'priority-low') stat.priority = -1;
        if (key === 'priority-normal') stat.priority = 0;
        if (key === 'priority-high') stat.priority = 1;
      });
    }
    record.fileStats = stats;
  }
}
