/**
 * Transport port to the torrent daemon
 * This is a port in Hexagonal Architecture
 */

export type RpcMethod =
  | 'session-get'
  | 'torrent-get'
  | 'torrent-add'
  | 'torrent-remove'
  | 'torrent-start'
  | 'torrent-start-now'
  | 'torrent-stop'
  | 'torrent-verify'
  | 'torrent-reannounce'
  | 'torrent-set'
  | 'torrent-set-location';

export type RpcArguments = Readonly<Record<string, unknown>>;

export interface IRpcTransport {
  /**
   * Performs one RPC call
   * @param method - Daemon method name
   * @param args - Named method arguments
   * @returns The decoded "arguments" object of the daemon's reply
   * @throws TransportError when the call cannot be completed or the daemon rejects it
   */
  request(method: RpcMethod, args?: RpcArguments): Promise<Record<string, unknown>>;
}
