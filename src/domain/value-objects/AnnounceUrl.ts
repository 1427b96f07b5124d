/**
 * Tracker announce URL with normalized equality
 *
 * Scheme and host compare case-insensitively, default ports of http(s) are
 * dropped, a trailing slash is ignored and "http://" is assumed when the
 * scheme is missing.
 */

import { InputError } from '../errors';

const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

export class AnnounceUrl {
  private readonly url: URL;

  constructor(input: string) {
    const withScheme = HAS_SCHEME.test(input) ? input : `http://${input}`;
    try {
      this.url = new URL(withScheme);
    } catch {
      throw new InputError(`Invalid URL: ${JSON.stringify(input)}`);
    }
  }

  /** Like the constructor, but null instead of an error for invalid input */
  static tryParse(input: string): AnnounceUrl | null {
    const withScheme = HAS_SCHEME.test(input) ? input : `http://${input}`;
    return URL.canParse(withScheme) ? new AnnounceUrl(withScheme) : null;
  }

  get normalized(): string {
    const pathname = this.url.pathname.length > 1 ? this.url.pathname.replace(/\/+$/, '') : '';
    return `${this.url.protocol.toLowerCase()}//${this.url.host.toLowerCase()}${pathname}${this.url.search}`;
  }

  get hostname(): string {
    return this.url.hostname.toLowerCase();
  }

  /** Registered domain, e.g. "example.org" for "tracker.example.org" */
  get domain(): string {
    const host = this.hostname;
    if (IPV4.test(host) || host.startsWith('[')) {
      return host;
    }
    return host.split('.').slice(-2).join('.');
  }

  equals(other: AnnounceUrl): boolean {
    return this.normalized === other.normalized;
  }

  toString(): string {
    return this.url.href;
  }

  toJSON(): string {
    return this.url.href;
  }
}
