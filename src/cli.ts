#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';

import { Roundabout } from './Roundabout';
import { loadConfigurationFromEnv } from './config';
import { ConfigurationError } from './errors';
import { createLogger } from './utils';

const LOG_CLASS = 'roundabout/cli';

const main = async (): Promise<void> => {
  loadDotenv();

  let log = createLogger('info');
  let proxy: Roundabout;

  try {
    const { configuration, logLevel } = loadConfigurationFromEnv();
    log = createLogger(logLevel);
    configuration.log = log;

    proxy = new Roundabout(configuration);
  } catch (e) {
    const err = e instanceof Error ? e : new Error(String(e));
    log.error({}, err instanceof ConfigurationError ? 'Invalid configuration' : 'Unable to start', err, {
      class: LOG_CLASS,
    });
    process.exitCode = 1;

    return;
  }

  try {
    await proxy.start();
  } catch (e) {
    // already logged by the proxy
    process.exitCode = 1;

    return;
  }

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    // second signal drops open connections
    const force = stopping;
    stopping = true;

    log.info({}, 'Shutdown requested', {
      class: LOG_CLASS,
      signal,
      force,
    });

    proxy.stop(force)
      .then(() => {
        process.exitCode = 0;
      })
      .catch((err: Error) => {
        log.error({}, 'Failed to shut down gracefully', err, {
          class: LOG_CLASS,
        });
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: Error) => {
  console.error(err);
  process.exit(1);
});
