/**
 * Client-level options applied the next time the requester builds a client.
 * Last write wins.
 */
export class ClientSettings {
  private proxyUrl?: string;
  private agent?: string;
  private gzip = true;

  setProxy(proxy: string | undefined): this {
    this.proxyUrl = proxy;
    return this;
  }

  get proxy(): string | undefined {
    return this.proxyUrl;
  }

  setUserAgent(userAgent: string | undefined): this {
    this.agent = userAgent;
    return this;
  }

  get userAgent(): string | undefined {
    return this.agent;
  }

  setCompression(enabled: boolean): this {
    this.gzip = enabled;
    return this;
  }

  enableCompression(): this {
    return this.setCompression(true);
  }

  disableCompression(): this {
    return this.setCompression(false);
  }

  isCompressed(): boolean {
    return this.gzip;
  }
}
