import { ConfigurationError } from './errors';

const DEFAULT_PORT = 80;

export class UpstreamTarget {
  public readonly scheme = 'http';

  private constructor(
    public readonly host: string,
    public readonly port: number,
  ) {
    Object.freeze(this);
  }

  /**
   * Target identity, e.g. `http://localhost:8080`
   */
  public get address(): string {
    return `${this.scheme}://${this.formattedHost}:${this.port}`;
  }

  /**
   * Value for the `Host` header of the proxied request
   */
  public get hostHeader(): string {
    if (this.port === DEFAULT_PORT) {
      return this.formattedHost;
    }

    return `${this.formattedHost}:${this.port}`;
  }

  private get formattedHost(): string {
    return this.host.includes(':') ? `[${this.host}]` : this.host;
  }

  public toString(): string {
    return this.address;
  }

  /**
   * Parse `http://host[:port]` address
   * @param value
   * @throws ConfigurationError
   */
  public static parse(value: string): UpstreamTarget {
    const str = value.trim();
    if (!str) {
      throw new ConfigurationError('Empty upstream address');
    }

    let url: URL;
    try {
      url = new URL(str);
    } catch (e) {
      throw new ConfigurationError(`Unable to parse upstream address "${str}"`);
    }

    if (url.protocol !== 'http:') {
      throw new ConfigurationError(`Unsupported scheme "${url.protocol.slice(0, -1)}" in upstream address "${str}", expected http`);
    }

    if (!url.hostname) {
      throw new ConfigurationError(`Missing host in upstream address "${str}"`);
    }

    if (url.username || url.password) {
      throw new ConfigurationError(`Credentials are not allowed in upstream address "${str}"`);
    }

    if (url.pathname !== '/' || url.search || url.hash) {
      throw new ConfigurationError(`Path, query and fragment are not allowed in upstream address "${str}"`);
    }

    // URL drops the default port and rejects ports outside 0..65535
    const port = url.port ? Number(url.port) : DEFAULT_PORT;
    if (port < 1) {
      throw new ConfigurationError(`Invalid port in upstream address "${str}"`);
    }

    let host = url.hostname;
    if (host.startsWith('[') && host.endsWith(']')) {
      host = host.slice(1, -1);
    }

    return new UpstreamTarget(host, port);
  }
}
