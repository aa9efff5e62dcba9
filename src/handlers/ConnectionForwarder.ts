import { request as httpRequest, type IncomingMessage, type OutgoingHttpHeaders } from 'node:http';
import { TLSSocket } from 'node:tls';
import type { LookupFunction, Socket } from 'node:net';

import type { Context, Headers, LogConfiguration, Outcome, Request, Response } from '../interfaces';
import type { UpstreamTarget } from '../UpstreamTarget';
import { ClientDisconnectedError, UpstreamTimeoutError, UpstreamUnreachableError } from '../errors';
import { RequestUtils, Timer } from '../utils';

export interface ConnectionForwarderOptions {
  connectTimeout: number;
  upstreamTimeout: number;
  lookup?: LookupFunction;
  proxyRequestHeaders?: Headers;
  responseHeaders?: Headers;
}

/**
 * Relays a single request/response cycle between the client and an upstream.
 * Holds no state across calls.
 */
export class ConnectionForwarder {
  static LOG_CLASS = 'roundabout/forwarder';

  constructor(
    private log: Required<LogConfiguration>,
    private options: ConnectionForwarderOptions,
  ) {}

  /**
   * Relay request to the target and stream the response back.
   * Never rejects, all failures are reported as an Outcome.
   * @param req
   * @param res
   * @param target
   * @param context
   */
  public relay(req: Request, res: Response, target: UpstreamTarget, context: Context): Promise<Outcome> {
    const startedAt = Date.now();
    const duration = () => Date.now() - startedAt;

    const method = req.method ?? 'GET';
    const path = RequestUtils.getPath(req);
    const logParams = {
      class: ConnectionForwarder.LOG_CLASS,
      method,
      target: target.address,
      path,
    };

    if (req.socket.destroyed) {
      this.log.debug(context, 'Client connection already closed, skipping relay', logParams);

      return Promise.resolve({
        type: 'client-disconnected',
        bytesRelayed: 0,
        duration: 0,
      });
    }

    this.log.debug(context, 'Processing HTTP proxy request', logParams);

    return new Promise<Outcome>((resolve) => {
      let settled = false;
      let responseStarted = false;
      let timedOut = false;
      let requestBytes = 0;
      let bytesRelayed = 0;
      let connectTimer: Timer | null = null;

      // fresh connection per request, so the upstream socket lives exactly as long as the relay
      const upstreamReq = httpRequest({
        host: target.host,
        port: target.port,
        method,
        path: req.url,
        headers: this.prepareRequestHeaders(req, target),
        lookup: this.options.lookup,
        agent: false,
      });

      const onRequestData = (chunk: Buffer) => {
        requestBytes += chunk.length;
      };

      const onClientClose = () => {
        // "close" is also emitted after a complete response
        if (res.writableFinished) {
          return;
        }

        this.log.debug(context, 'Client disconnected before the response was complete', {
          ...logParams,
          bytesRelayed,
        });

        finish({
          type: 'client-disconnected',
          bytesRelayed,
          duration: duration(),
        });
        upstreamReq.destroy(new ClientDisconnectedError('Client disconnected', target.address));
      };

      const finish = (outcome: Outcome) => {
        if (settled) return;
        settled = true;

        connectTimer?.cancel();
        req.off('data', onRequestData);
        res.off('close', onClientClose);

        resolve(outcome);
      };

      // failure after the response head was relayed, the client can only be cut off
      const abort = (err: Error) => {
        if (settled) return;

        this.log.error(context, 'Upstream failed after the response was started', err, {
          ...logParams,
          bytesRelayed,
        });

        finish({
          type: 'upstream-aborted',
          error: err,
          bytesRelayed,
          duration: duration(),
        });
        upstreamReq.destroy();
        res.destroy();
      };

      const onConnect = () => {
        connectTimer?.cancel();
        if (settled) return;

        this.log.debug(context, 'Connected to upstream', logParams);

        upstreamReq.setTimeout(this.options.upstreamTimeout, () => {
          timedOut = true;
          upstreamReq.destroy(new UpstreamTimeoutError(
            `Upstream ${target.address} did not respond within ${this.options.upstreamTimeout}ms`,
            target.address,
          ));
        });

        // body of an earlier attempt was empty and is fully consumed
        if (req.readableEnded) {
          upstreamReq.end();
        } else {
          req.on('data', onRequestData);
          req.pipe(upstreamReq);
        }
      };

      res.once('close', onClientClose);

      upstreamReq.once('socket', (socket: Socket) => {
        if (!socket.connecting) {
          onConnect();
          return;
        }

        connectTimer = new Timer(() => {
          upstreamReq.destroy(new UpstreamUnreachableError(
            `Connection to ${target.address} timed out after ${this.options.connectTimeout}ms`,
            target.address,
          ));
        }, this.options.connectTimeout);

        socket.once('connect', onConnect);
      });

      // failure before anything was sent to the client, the dispatcher may try another upstream
      const fail = (err: Error) => {
        this.log.error(context, 'Proxy request failed', err, logParams);

        req.unpipe(upstreamReq);
        if (!req.readableEnded) {
          req.pause();
        }

        const replayable = requestBytes === 0;
        if (err instanceof UpstreamTimeoutError) {
          finish({
            type: 'upstream-timeout',
            error: err,
            replayable,
            duration: duration(),
          });
          return;
        }

        finish({
          type: 'upstream-unreachable',
          error: err instanceof UpstreamUnreachableError
            ? err
            : new UpstreamUnreachableError(`Upstream ${target.address} is unreachable: ${err.message}`, target.address, err),
          replayable,
          duration: duration(),
        });
      };

      upstreamReq.on('error', (err: Error) => {
        if (settled) {
          this.log.debug(context, 'Upstream request closed', {
            ...logParams,
            reason: err.message,
          });
          return;
        }

        if (responseStarted) {
          abort(err);
          return;
        }

        fail(err);
      });

      upstreamReq.once('response', (response: IncomingMessage) => {
        if (settled) {
          response.resume();
          return;
        }

        const statusCode = response.statusCode ?? 0;

        this.log.debug(context, 'Response received', {
          ...logParams,
          responseStatusCode: statusCode,
        });

        // the parser takes any 3 digits, the server response only 100..999
        if (statusCode < 100 || statusCode > 999) {
          fail(new UpstreamUnreachableError(`Upstream ${target.address} responded with invalid status code ${statusCode}`, target.address));
          upstreamReq.destroy();
          return;
        }

        const headersToSet = RequestUtils.prepareProxyHeaders(
          RequestUtils.removeHopByHopHeaders(response.headers),
          this.options.responseHeaders,
        );

        try {
          res.writeHead(statusCode, response.statusMessage, headersToSet);
        } catch (e) {
          const err = e instanceof Error ? e : new Error(String(e));
          fail(new UpstreamUnreachableError(`Unable to relay response head of ${target.address}: ${err.message}`, target.address, err));
          upstreamReq.destroy();
          return;
        }

        responseStarted = true;

        response.on('data', (chunk: Buffer) => {
          bytesRelayed += chunk.length;
        });

        response.once('error', abort);

        response.once('close', () => {
          if (response.complete) return;

          abort(timedOut
            ? new UpstreamTimeoutError(`Upstream ${target.address} stalled while sending the response`, target.address)
            : new UpstreamUnreachableError(`Upstream ${target.address} closed the connection before the response was complete`, target.address),
          );
        });

        res.once('finish', () => {
          this.log.debug(context, 'Proxy request completed', {
            ...logParams,
            responseStatusCode: statusCode,
            bytesRelayed,
          });

          finish({
            type: 'success',
            statusCode,
            bytesRelayed,
            duration: duration(),
          });
        });

        response.pipe(res);
      });
    });
  }

  /**
   * Prepare headers for the upstream request
   * @param req
   * @param target
   */
  private prepareRequestHeaders(req: Request, target: UpstreamTarget): OutgoingHttpHeaders {
    const incoming = RequestUtils.removeHopByHopHeaders(req.headers);
    const adjustments: Headers = {
      host: target.hostHeader,
    };

    const clientAddress = RequestUtils.getClientAddress(req);
    if (clientAddress) {
      adjustments['x-forwarded-for'] = RequestUtils.appendForwardedFor(incoming['x-forwarded-for'], clientAddress);
    }

    if (!incoming['x-forwarded-proto']) {
      adjustments['x-forwarded-proto'] = req.socket instanceof TLSSocket ? 'https' : 'http';
    }

    if (!incoming['x-forwarded-host'] && incoming.host) {
      adjustments['x-forwarded-host'] = incoming.host;
    }

    return RequestUtils.prepareProxyHeaders(
      incoming,
      adjustments,
      this.options.proxyRequestHeaders,
    );
  }
}
