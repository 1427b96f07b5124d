import { AnnounceUrl } from '../value-objects/AnnounceUrl';

export interface Tracker {
  readonly id: number;
  readonly tier: number;
  readonly announce: AnnounceUrl;
  readonly scrape: string;
  readonly domain: string;
}
