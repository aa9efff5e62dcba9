import { suite, test } from '@testdeck/mocha';
import { deepStrictEqual, strictEqual } from 'node:assert';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { FetchHelpers, TestProxy, TestServer, asRecord } from './helpers';

@suite()
export class RoundaboutSecureSuite {
  private static readonly key = readFileSync(resolve(__dirname, 'key.pem'), 'utf-8');
  private static readonly cert = readFileSync(resolve(__dirname, 'cert.pem'), 'utf-8');

  private servers: TestServer[] = [];
  private proxy: TestProxy | null = null;
  private fetch = new FetchHelpers();

  /**
   * Before hook
   */
  async before(): Promise<void> {
    this.servers = ['A', 'B'].map(name => new TestServer(name));
    await Promise.all(this.servers.map(s => s.start()));

    this.proxy = new TestProxy(this.servers.map(s => s.url), {
      secure: {
        key: RoundaboutSecureSuite.key,
        cert: RoundaboutSecureSuite.cert,
      },
    });
    await this.proxy.start();
  }

  /**
   * After hook
   */
  async after(): Promise<void> {
    await this.proxy?.stop(true);
    await Promise.all(this.servers.map(s => s.stop()));
  }

  private get proxyUrl(): string {
    if (!this.proxy) {
      throw new Error('Proxy is not started');
    }

    return this.proxy.url;
  }

  @test()
  async tlsIsTerminatedAtTheListener(): Promise<void> {
    const [A, B] = this.servers;

    const first = await this.fetch.getSecure(`${this.proxyUrl}/headers`, RoundaboutSecureSuite.cert);
    strictEqual(first.status, 200);

    const data = asRecord(first.data);
    strictEqual(data.name, 'A');

    // upstream gets plain HTTP with the original scheme forwarded
    const headers = asRecord(data.headers);
    strictEqual(headers['host'], `127.0.0.1:${A.port}`);
    strictEqual(headers['x-forwarded-proto'], 'https');
    strictEqual(headers['x-forwarded-host'], new URL(this.proxyUrl).host);

    const second = await this.fetch.getSecure(`${this.proxyUrl}/`, RoundaboutSecureSuite.cert);
    deepStrictEqual(second.data, {
      name: 'B',
      method: 'GET',
      url: '/',
    });
    strictEqual(B.requests, 1);
  }
}
