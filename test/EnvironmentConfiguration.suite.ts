import { suite, test } from '@testdeck/mocha';
import { deepStrictEqual, ok, strictEqual, throws } from 'node:assert';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigurationError, FailureThresholdHealthObserver, loadConfigurationFromEnv } from '../src';

@suite()
export class EnvironmentConfigurationSuite {
  @test()
  defaults(): void {
    const { configuration, logLevel } = loadConfigurationFromEnv({});

    deepStrictEqual(configuration, {
      hostname: '0.0.0.0',
      port: 80,
      upstream: ['http://localhost:8080'],
      connectTimeout: 5000,
      upstreamTimeout: 60000,
      clientTimeout: 60000,
      retryOnTimeout: false,
    });
    strictEqual(logLevel, 'info');
  }

  @test()
  fullConfiguration(): void {
    const { configuration, logLevel } = loadConfigurationFromEnv({
      UPSTREAM_SERVERS: 'http://10.0.0.1:8081, http://10.0.0.2:8082 ',
      LISTEN_PORT: '3000',
      LISTEN_HOST: '127.0.0.1',
      CONNECT_TIMEOUT_MS: '100',
      UPSTREAM_TIMEOUT_MS: '200',
      CLIENT_TIMEOUT_MS: '300',
      MAX_ATTEMPTS: '1',
      RETRY_ON_TIMEOUT: 'true',
      HEALTH_FAILURE_THRESHOLD: '3',
      HEALTH_COOLDOWN_MS: '1000',
      LOG_LEVEL: 'verbose',
    });

    deepStrictEqual(configuration.upstream, ['http://10.0.0.1:8081', 'http://10.0.0.2:8082']);
    strictEqual(configuration.port, 3000);
    strictEqual(configuration.hostname, '127.0.0.1');
    strictEqual(configuration.connectTimeout, 100);
    strictEqual(configuration.upstreamTimeout, 200);
    strictEqual(configuration.clientTimeout, 300);
    strictEqual(configuration.maxAttempts, 1);
    strictEqual(configuration.retryOnTimeout, true);
    ok(configuration.healthObserver instanceof FailureThresholdHealthObserver);
    strictEqual(logLevel, 'verbose');
  }

  @test()
  invalidUpstreamServers(): void {
    throws(() => loadConfigurationFromEnv({ UPSTREAM_SERVERS: '' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ UPSTREAM_SERVERS: 'http://a.test:1,,http://b.test:2' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ UPSTREAM_SERVERS: 'ftp://a.test:21' }), ConfigurationError);
  }

  @test()
  invalidNumbers(): void {
    throws(() => loadConfigurationFromEnv({ LISTEN_PORT: 'http' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ LISTEN_PORT: '70000' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ LISTEN_PORT: '-1' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ CONNECT_TIMEOUT_MS: '0' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ MAX_ATTEMPTS: '0' }), ConfigurationError);
  }

  @test()
  timeoutsAreLimitedToTimerRange(): void {
    throws(() => loadConfigurationFromEnv({ CONNECT_TIMEOUT_MS: '2147483648' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ UPSTREAM_TIMEOUT_MS: '2147483648' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ CLIENT_TIMEOUT_MS: '9999999999' }), ConfigurationError);
    throws(() => loadConfigurationFromEnv({ HEALTH_FAILURE_THRESHOLD: '1', HEALTH_COOLDOWN_MS: '2147483648' }), ConfigurationError);

    const { configuration } = loadConfigurationFromEnv({ UPSTREAM_TIMEOUT_MS: '2147483647' });
    strictEqual(configuration.upstreamTimeout, 2147483647);
  }

  @test()
  invalidBoolean(): void {
    throws(() => loadConfigurationFromEnv({ RETRY_ON_TIMEOUT: 'yes' }), ConfigurationError);
  }

  @test()
  partialTlsConfiguration(): void {
    throws(() => loadConfigurationFromEnv({ SSL_CERT_PATH: '/tmp/cert.pem' }), ConfigurationError);
  }

  @test()
  tlsConfiguration(): void {
    const { configuration } = loadConfigurationFromEnv({
      SSL_CERT_PATH: resolve(__dirname, 'cert.pem'),
      SSL_KEY_PATH: resolve(__dirname, 'key.pem'),
    });

    strictEqual(configuration.port, 443);
    deepStrictEqual(configuration.secure, {
      cert: readFileSync(resolve(__dirname, 'cert.pem'), 'utf-8'),
      key: readFileSync(resolve(__dirname, 'key.pem'), 'utf-8'),
    });
  }

  @test()
  missingTlsFiles(): void {
    throws(() => loadConfigurationFromEnv({
      SSL_CERT_PATH: '/non-existing/cert.pem',
      SSL_KEY_PATH: '/non-existing/key.pem',
    }), ConfigurationError);
  }
}
