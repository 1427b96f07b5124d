/**
 * One file inside a torrent; its ID is its index in the torrent's file list
 */

import { FilePriority } from '../value-objects/FilePriority';
import { Percent, Quantity } from '../value-objects/Quantity';
import { SmartString } from '../value-objects/SmartString';

export interface TorrentFileProps {
  torrentId: number;
  id: number;
  name: string;
  path: string;
  sizeTotal: Quantity;
  sizeDownloaded: Quantity;
  isWanted: boolean;
  priority: FilePriority;
}

export class TorrentFile {
  readonly torrentId: number;
  readonly id: number;
  readonly name: SmartString;
  readonly path: string;
  readonly sizeTotal: Quantity;
  readonly sizeDownloaded: Quantity;
  readonly isWanted: boolean;
  readonly priority: FilePriority;

  constructor(props: TorrentFileProps) {
    this.torrentId = props.torrentId;
    this.id = props.id;
    this.name = new SmartString(props.name);
    this.path = props.path;
    this.sizeTotal = props.sizeTotal;
    this.sizeDownloaded = props.sizeDownloaded;
    this.isWanted = props.isWanted;
    this.priority = props.priority;
  }

  get progress(): Percent {
    const total = this.sizeTotal.value;
    return new Percent(total > 0 ? (this.sizeDownloaded.value / total) * 100 : 100);
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      name: this.name.value,
      path: this.path,
      'size-total': this.sizeTotal.withUnit,
      'size-downloaded': this.sizeDownloaded.withUnit,
      progress: this.progress.toString(),
      'is-wanted': this.isWanted,
      priority: this.priority.name
    };
  }
}
