import { createServer as createHttp1Server } from 'node:http';
import { createServer as createSecureHttp1Server } from 'node:https';
import type { AddressInfo, Socket } from 'node:net';
import type { Duplex } from 'node:stream';

import type { Configuration, Context, ErrorHandler, LogConfiguration, Outcome, Request, Response, Server } from './interfaces';
import { ConnectionForwarder } from './handlers';
import { UpstreamPool } from './UpstreamPool';
import { Hooks } from './Hooks';
import { MAX_TIMEOUT, RequestUtils } from './utils';
import { ConfigurationError, ProxyError, UpstreamTimeoutError, UpstreamUnreachableError } from './errors';

type Logger = Required<LogConfiguration>;

const noop = () => {};

export class Roundabout {
  static LOG_CLASS = 'roundabout';

  private server: Server | null = null;
  private log: Logger;
  private sockets = new Set<Socket>();
  private hooks: Hooks;
  private forwarder: ConnectionForwarder;
  private requestId = 0;

  public readonly pool: UpstreamPool;

  /**
   * @param configuration
   * @throws ConfigurationError
   */
  constructor(private configuration: Configuration) {
    // set default values
    configuration.connectTimeout = configuration.connectTimeout ?? 5 * 1000;
    configuration.upstreamTimeout = configuration.upstreamTimeout ?? 60 * 1000;
    configuration.clientTimeout = configuration.clientTimeout ?? 60 * 1000;
    configuration.retryOnTimeout = configuration.retryOnTimeout ?? false;

    Roundabout.validate(configuration);

    const { log } = configuration;
    this.log = {
      debug: log?.debug ?? noop,
      info: log?.info ?? noop,
      error: log?.error ?? noop,
    };

    this.pool = UpstreamPool.fromAddresses(configuration.upstream, configuration.healthObserver);
    this.hooks = new Hooks(this.log, configuration);
    this.forwarder = new ConnectionForwarder(this.log, {
      connectTimeout: configuration.connectTimeout,
      upstreamTimeout: configuration.upstreamTimeout,
      lookup: configuration.lookup,
      proxyRequestHeaders: configuration.proxyRequestHeaders,
      responseHeaders: configuration.responseHeaders,
    });
  }

  private static validate(configuration: Configuration): void {
    const { port } = configuration;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigurationError(`Invalid port "${port}"`);
    }

    const timeouts = {
      connectTimeout: configuration.connectTimeout,
      upstreamTimeout: configuration.upstreamTimeout,
      clientTimeout: configuration.clientTimeout,
    };
    for (const [name, value] of Object.entries(timeouts)) {
      if (value === undefined || !Number.isFinite(value) || value <= 0 || value > MAX_TIMEOUT) {
        throw new ConfigurationError(`Invalid ${name} "${value}", expected number of milliseconds between 1 and ${MAX_TIMEOUT}`);
      }
    }

    const { maxAttempts } = configuration;
    if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts < 1)) {
      throw new ConfigurationError(`Invalid maxAttempts "${maxAttempts}", expected positive integer`);
    }
  }

  /**
   * Address the proxy is listening on, null when not started
   */
  public get address(): AddressInfo | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return null;
    }

    return address;
  }

  /**
   * Max number of upstreams tried per request
   */
  private get maxAttempts(): number {
    return Math.min(this.configuration.maxAttempts ?? this.pool.size, this.pool.size);
  }

  /**
   * Create server, TLS is terminated here when configured
   */
  private createServer(cb: (req: Request, res: Response) => void): Server {
    if (this.configuration.secure) {
      return createSecureHttp1Server({
        ...this.configuration.secure,
      }, cb);
    }

    return createHttp1Server(cb);
  }

  /**
   * Start proxy server
   */
  public async start(): Promise<void> {
    if (this.server) {
      this.log.info({}, 'Start action skipped, already running', {
        class: Roundabout.LOG_CLASS,
      });

      return;
    }

    let { hostname, port } = this.configuration;
    hostname = hostname || 'localhost';

    const server = this.createServer((req: Request, res: Response) => {
      this.handle(req, res).catch((err: Error) => {
        this.log.error({}, 'Unexpected error upon handling request', err, {
          class: Roundabout.LOG_CLASS,
          method: req.method,
          path: RequestUtils.getPath(req),
        });
        res.destroy();
      });
    });

    server.on('clientError', (err: Error, socket: Duplex) => {
      this.log.debug({}, 'Client error', {
        class: Roundabout.LOG_CLASS,
        reason: err.message,
      });

      if (socket.writable) {
        socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
      } else {
        socket.destroy();
      }
    });

    // idle client sockets get destroyed unless a request handler deals with the timeout
    server.timeout = this.configuration.clientTimeout ?? 0;

    // keep track of all open connections
    server.on('connection', (connection: Socket) => {
      this.sockets.add(connection);

      connection.once('close', () => {
        this.sockets.delete(connection);
      });
    });

    // start listening on incoming connections
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        this.log.error({}, 'Failed to start listening', err, {
          class: Roundabout.LOG_CLASS,
          hostname,
          port,
        });
        reject(err);
      };

      server.once('error', onError);
      server.listen(port, hostname, () => {
        server.off('error', onError);
        this.server = server;
        this.log.info({}, 'Started listening for connections', {
          class: Roundabout.LOG_CLASS,
          secure: !!this.configuration.secure,
          hostname,
          port: this.address?.port ?? port,
          upstream: this.pool.targets.map(t => t.address),
        });
        resolve();
      });
    });
  }

  /**
   * Handle single request, one handling unit per request
   * @param req
   * @param res
   */
  private async handle(req: Request, res: Response): Promise<void> {
    const context: Context = {
      id: this.requestId++,
      state: 'Accepted',
    };
    const path = RequestUtils.getPath(req);

    this.hooks.onBeforeHttpRequest(path, req, res, context);
    context.state = 'Reading';

    req.on('error', (err: Error) => {
      this.log.debug(context, 'Client request stream error', {
        class: Roundabout.LOG_CLASS,
        method: req.method,
        path,
        reason: err.message,
      });
    });

    // idle client: only while the request is still being received,
    // a request waiting on the upstream is governed by the upstream timeout
    res.on('timeout', (socket: Socket) => {
      if (req.complete) {
        return;
      }

      this.log.debug(context, 'Client idle timeout', {
        class: Roundabout.LOG_CLASS,
        method: req.method,
        path,
      });
      socket.destroy();
    });

    let lastError: ProxyError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const target = this.pool.next();
      context.attempt = attempt;
      context.target = target.address;
      context.state = attempt === 1 ? 'Dispatched' : 'Retrying';

      this.log.debug(context, 'Dispatching request', {
        class: Roundabout.LOG_CLASS,
        method: req.method,
        path,
        target: target.address,
        attempt,
      });

      context.state = 'Relaying';
      const outcome = await this.forwarder.relay(req, res, target, context);
      this.configuration.healthObserver?.recordOutcome(target, outcome);
      this.hooks.onOutcome(target, outcome, context);

      const retry = this.shouldRetry(outcome);
      if (outcome.type === 'upstream-unreachable' || outcome.type === 'upstream-timeout') {
        lastError = outcome.error instanceof ProxyError
          ? outcome.error
          : new UpstreamUnreachableError(outcome.error.message, target.address, outcome.error);

        if (retry) {
          this.log.info(context, 'Upstream attempt failed, trying next upstream', {
            class: Roundabout.LOG_CLASS,
            method: req.method,
            path,
            target: target.address,
            attempt,
            outcome: outcome.type,
          });
          continue;
        }
      }

      if (outcome.type === 'success') {
        context.state = 'Completed';
        this.hooks.onAfterHttpRequest(path, req, res, context);
        return;
      }

      if (outcome.type === 'upstream-aborted' || outcome.type === 'client-disconnected') {
        context.state = 'Failed';
        this.hooks.onAfterHttpRequest(path, req, res, context);
        return;
      }

      break;
    }

    context.state = 'Failed';
    // loop runs at least once, pool can't be empty
    await this.sendGatewayError(req, res, lastError ?? new UpstreamUnreachableError('No upstream available'), context);
    this.hooks.onAfterHttpRequest(path, req, res, context);
  }

  /**
   * Check if request may go to the next upstream
   * @param outcome
   */
  private shouldRetry(outcome: Outcome): boolean {
    switch (outcome.type) {
      case 'upstream-unreachable':
        return outcome.replayable;
      case 'upstream-timeout':
        return outcome.replayable && !!this.configuration.retryOnTimeout;
      default:
        return false;
    }
  }

  /**
   * Send 502/504 with the configured error handler, falling back to the default one
   * @param req
   * @param res
   * @param err
   * @param context
   */
  private async sendGatewayError(req: Request, res: Response, err: ProxyError, context: Context): Promise<void> {
    const method = req.method;
    const path = RequestUtils.getPath(req);

    if (req.socket.destroyed) {
      this.log.debug(context, 'Client connection closed, gateway error not sent', {
        class: Roundabout.LOG_CLASS,
        method,
        path,
      });

      return;
    }

    this.log.error(context, 'All upstream attempts failed', err, {
      class: Roundabout.LOG_CLASS,
      method,
      path,
      attempts: context.attempt,
    });

    const errorHandler: ErrorHandler | undefined = this.configuration.errorHandler;
    if (errorHandler) {
      try {
        await errorHandler(req, res, err, context);
        return;
      } catch (e) {
        this.log.error(context, 'Unable to handle gateway error with errorHandler', e instanceof Error ? e : null, {
          class: Roundabout.LOG_CLASS,
          method,
          path,
        });

        if (res.headersSent) {
          res.destroy();
          return;
        }
      }
    }

    this.sendErrorResponse(context, err, req, res);
  }

  /**
   * Send default gateway error response
   * @param context
   * @param err
   * @param req
   * @param res
   */
  private sendErrorResponse(context: Context, err: ProxyError, req: Request, res: Response): void {
    const statusCode = Roundabout.getStatusCode(err);
    const message = statusCode === 504 ? 'Gateway Timeout' : 'Bad Gateway';

    try {
      let contentType = 'text/plain';
      let data = message;

      if (req.headers.accept && req.headers.accept.indexOf('application/json') >= 0) {
        contentType = 'application/json';
        data = JSON.stringify({
          error: message,
        });
      }

      res.writeHead(statusCode, {
        'content-type': contentType,
        'content-length': Buffer.byteLength(data),
      });
      res.end(data);
    } catch (e) {
      this.log.error(context, `Failed to send ${statusCode} error`, e instanceof Error ? e : null, {
        class: Roundabout.LOG_CLASS,
        method: req.method,
        path: RequestUtils.getPath(req),
      });
      res.destroy();
    }
  }

  /**
   * Map gateway error to the response status code
   * @param err
   */
  public static getStatusCode(err: ProxyError): number {
    return err instanceof UpstreamTimeoutError ? 504 : 502;
  }

  /**
   * Stop proxy service if running
   * @param force destroy open client connections instead of waiting for them to finish
   */
  public async stop(force?: boolean): Promise<void> {
    const server = this.server;

    if (server) {
      this.server = null;
      await new Promise<void>((res, rej) => {
        this.log.info({}, 'Stopping', {
          class: Roundabout.LOG_CLASS,
        });

        server.close((err) => {
          if (err) {
            this.log.error({}, 'Failed to stop', err, {
              class: Roundabout.LOG_CLASS,
            });
            return rej(err);
          }

          this.log.info({}, 'Stopped', {
            class: Roundabout.LOG_CLASS,
          });
          res();
        });

        if (force) {
          this.destroySockets();
        } else {
          server.closeIdleConnections();
        }
      });
    } else if (force && this.sockets.size) {
      this.log.info({}, 'Dropping open connections', {
        class: Roundabout.LOG_CLASS,
        connections: this.sockets.size,
      });
      this.destroySockets();
    } else {
      this.log.info({}, 'Stop action skipped, not running', {
        class: Roundabout.LOG_CLASS,
      });
    }
  }

  private destroySockets(): void {
    this.sockets.forEach(s => {
      s.destroy();
      this.sockets.delete(s);
    });
  }
}
