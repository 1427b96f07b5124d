/**
 * JSON rendering of torrents through the typed value layer
 */

import { ClientResponse } from '../../../domain/entities/ClientResponse';
import { Torrent } from '../../../domain/entities/Torrent';
import { TorrentKey, TorrentValues } from '../../../domain/entities/TorrentFields';
import { Tracker } from '../../../domain/entities/Tracker';
import { Quantity } from '../../../domain/value-objects/Quantity';

type ScalarValue = TorrentValues[Exclude<TorrentKey, 'files' | 'trackers'>];

function renderScalar(value: ScalarValue): string | number | boolean {
  if (typeof value !== 'object') {
    return value;
  }
  return value instanceof Quantity ? value.withUnit : value.toString();
}

function renderTracker(tracker: Tracker): Record<string, unknown> {
  return {
    id: tracker.id,
    tier: tracker.tier,
    announce: tracker.announce.toString(),
    domain: tracker.domain
  };
}

export function renderTorrent(torrent: Torrent): Record<string, unknown> {
  const rendered: Record<string, unknown> = {};
  for (const key of torrent.keys()) {
    if (key === 'files') {
      rendered.files = torrent.get('files').map((file) => file.toJSON());
    } else if (key === 'trackers') {
      rendered.trackers = torrent.get('trackers').map(renderTracker);
    } else {
      rendered[key] = renderScalar(torrent.get(key));
    }
  }
  return rendered;
}

export function renderResponse(response: ClientResponse<readonly Torrent[]>): Record<string, unknown> {
  return {
    success: response.success,
    torrents: response.result.map(renderTorrent),
    messages: response.messages
  };
}
