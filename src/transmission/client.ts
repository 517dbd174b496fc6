import axios, { AxiosHeaders, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { config } from '../config';
import { DispatchError } from '../utils/errors';
import { logger } from '../services/structuredLogging';
import type { AddedTorrent, TorrentClient, TransmissionTorrent } from './types';

export const SESSION_HEADER = 'X-Transmission-Session-Id';

export interface TransmissionOptions {
  url: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (headers instanceof AxiosHeaders) {
    const value = headers.get(name);
    return typeof value === 'string' ? value : undefined;
  }
  if (!isRecord(headers)) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

function toTorrent(value: unknown): TransmissionTorrent | null {
  if (!isRecord(value)) return null;
  const { id, name, hashString } = value;
  if (typeof id !== 'number') return null;
  return {
    id,
    name: typeof name === 'string' ? name : '',
    hashString: typeof hashString === 'string' ? hashString.toLowerCase() : '',
  };
}

export class TransmissionClient implements TorrentClient {
  private sessionId: string | null = null;
  private readonly http: AxiosInstance;

  constructor(private readonly options: TransmissionOptions = config.transmission, http?: AxiosInstance) {
    this.http =
      http ||
      axios.create({
        timeout: options.timeoutMs ?? 15000,
      });
  }

  async addTorrent(downloadUrl: string, downloadDir: string): Promise<AddedTorrent> {
    const args = await this.call('torrent-add', { filename: downloadUrl, 'download-dir': downloadDir });
    const duplicate = toTorrent(args['torrent-duplicate']);
    if (duplicate) {
      logger.info('transmission', `Torrent already present: ${duplicate.name}`);
      return { torrent: duplicate, duplicate: true };
    }
    return { torrent: toTorrent(args['torrent-added']), duplicate: false };
  }

  /**
   * Sends one RPC request. A 409 carries a fresh session id; the request is
   * repeated once with it and a second 409 fails the call.
   */
  async call(method: string, args: Record<string, unknown>): Promise<Record<string, unknown>> {
    if (!this.options.url) {
      throw new DispatchError('Transmission URL is not configured', 'network');
    }

    let response = await this.post(method, args);
    if (response.status === 409) {
      this.refreshSession(response);
      logger.debug('transmission', `Session refreshed, retrying ${method}`);
      response = await this.post(method, args);
      if (response.status === 409) {
        throw new DispatchError(`Transmission rejected the session twice for ${method}`, 'session');
      }
    }

    if (response.status === 401 || response.status === 403) {
      throw new DispatchError(`Transmission authentication failed (HTTP ${response.status})`, 'auth');
    }
    if (response.status < 200 || response.status >= 300) {
      throw new DispatchError(`Transmission returned HTTP ${response.status} for ${method}`, 'network');
    }

    const body: unknown = response.data;
    if (!isRecord(body)) {
      throw new DispatchError(`Transmission sent an unreadable response for ${method}`, 'rejected');
    }
    if (body.result !== 'success') {
      throw new DispatchError(`Transmission ${method} failed: ${String(body.result)}`, 'rejected');
    }
    return isRecord(body.arguments) ? body.arguments : {};
  }

  private refreshSession(response: AxiosResponse): void {
    const sessionId = headerValue(response.headers, SESSION_HEADER);
    if (!sessionId) {
      throw new DispatchError(`Transmission answered 409 without ${SESSION_HEADER}`, 'session');
    }
    this.sessionId = sessionId;
  }

  private async post(method: string, args: Record<string, unknown>): Promise<AxiosResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.sessionId) {
      headers[SESSION_HEADER] = this.sessionId;
    }

    try {
      return await this.http.post(
        this.options.url,
        { method, arguments: args },
        {
          headers,
          auth: this.options.username
            ? { username: this.options.username, password: this.options.password || '' }
            : undefined,
          validateStatus: () => true,
        }
      );
    } catch (error) {
      const reason = isAxiosError(error) ? error.code || error.message : String(error);
      throw new DispatchError(`Transmission ${method} request failed: ${reason}`, 'network', error);
    }
  }
}

export default new TransmissionClient();
