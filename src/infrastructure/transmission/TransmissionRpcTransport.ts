/**
 * Transmission RPC over HTTP
 *
 * Every call is a JSON POST of {method, arguments}. The daemon answers 409
 * with a fresh X-Transmission-Session-Id header when the session ID is
 * missing or stale; the call is then repeated once with the new ID.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { ProtocolError, TransportError } from '../../domain/errors';
import { ILogger, IRpcTransport, RpcArguments, RpcMethod } from '../../domain/interfaces';

export const SESSION_HEADER = 'X-Transmission-Session-Id';

export interface TransmissionRpcOptions {
  url: string;
  username?: string;
  password?: string;
  // Per-call timeout in milliseconds
  timeout: number;
  // Replaces the HTTP adapter, e.g. with an in-process fake
  adapter?: AxiosAdapter;
}

const zEnvelope = z.object({
  result: z.string(),
  arguments: z.record(z.unknown()).optional()
});

export class TransmissionRpcTransport implements IRpcTransport {
  private sessionId: string | null = null;
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: TransmissionRpcOptions,
    private readonly logger: ILogger
  ) {
    this.http = axios.create({
      baseURL: options.url,
      timeout: options.timeout,
      headers: { 'Content-Type': 'application/json' },
      auth: options.username !== undefined
        ? { username: options.username, password: options.password ?? '' }
        : undefined,
      adapter: options.adapter,
      // Status codes are handled below
      validateStatus: () => true
    });

    this.http.interceptors.request.use((config) => {
      if (this.sessionId !== null) {
        config.headers.set(SESSION_HEADER, this.sessionId);
      }
      return config;
    });
  }

  async request(method: RpcMethod, args: RpcArguments = {}): Promise<Record<string, unknown>> {
    this.logger.debug(`RPC ${method}`, args);
    let response = await this.post(method, args);

    if (response.status === 409) {
      const sessionId = response.headers[SESSION_HEADER.toLowerCase()];
      if (typeof sessionId !== 'string') {
        throw new TransportError(`HTTP 409 without ${SESSION_HEADER} header`, 'connection');
      }
      this.logger.debug(`New RPC session: ${sessionId}`);
      this.sessionId = sessionId;
      response = await this.post(method, args);
    }

    if (response.status === 401 || response.status === 403) {
      throw new TransportError(`Authentication failed: ${this.options.url}`, 'auth');
    }
    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(`HTTP ${response.status}: ${this.options.url}`, 'connection');
    }

    const envelope = zEnvelope.safeParse(response.data);
    if (!envelope.success) {
      throw new ProtocolError(`Malformed RPC response to ${method}`);
    }
    if (envelope.data.result !== 'success') {
      throw new TransportError(envelope.data.result, 'rejected');
    }
    return envelope.data.arguments ?? {};
  }

  private async post(method: RpcMethod, args: RpcArguments): Promise<AxiosResponse<unknown>> {
    try {
      return await this.http.post<unknown>('', { method, arguments: args });
    } catch (err) {
      if (!axios.isAxiosError(err)) {
        throw err;
      }
      if (err.code === 'ERR_CANCELED') {
        throw new TransportError(`${method} aborted`, 'aborted');
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        throw new TransportError(`${method} timed out after ${this.options.timeout}ms`, 'timeout');
      }
      throw new TransportError(`Connection failed: ${this.options.url}: ${err.message}`, 'connection');
    }
  }
}
