import type { LookupFunction } from 'node:net';
import type { SecureContextOptions } from 'node:tls';
import type { Request } from './Request';
import type { Response } from './Response';
import type { Context } from './Context';
import type { HealthObserver } from './HealthObserver';
import type { Outcome } from './Outcome';
import type { UpstreamTarget } from '../UpstreamTarget';
import type { ProxyError } from '../errors';

export type ErrorHandler = (req: Request, res: Response, err: ProxyError, context: Context) => Promise<void>;

export type LogParams = Record<string, unknown>;

export interface LogConfiguration {
  debug?: (context: Context, message: string, params?: LogParams) => void;
  info?: (context: Context, message: string, params?: LogParams) => void;
  error?: (context: Context, message: string, error?: Error | null, params?: LogParams) => void;
}

export type Headers = Record<string, string | string[] | null>;

export interface Configuration {
  /**
   * If provided, the listener terminates TLS and hands plain HTTP to the proxy
   */
  secure?: SecureContextOptions;

  /**
   * Host port, 0 to pick a free one
   */
  port: number;

  /**
   * Optional host name
   * @default localhost
   */
  hostname?: string;

  /**
   * Upstream addresses in round-robin order, e.g. `http://10.0.0.1:8080`
   */
  upstream: string[];

  /**
   * Max time to establish the upstream connection (DNS lookup included)
   * @default 5000
   */
  connectTimeout?: number;

  /**
   * Host name resolution for upstream connections, part of the connect phase
   * @default dns.lookup
   */
  lookup?: LookupFunction;

  /**
   * Max idle time on the upstream socket once connected
   * @default 60000 - 1 minute
   */
  upstreamTimeout?: number;

  /**
   * Max idle time while the client request is being received
   * @default 60000 - 1 minute
   */
  clientTimeout?: number;

  /**
   * Max number of upstreams tried for a single request, capped by the pool size
   * @default pool size
   */
  maxAttempts?: number;

  /**
   * Retry on another upstream when the upstream accepted the connection but did not respond in time
   * @default false
   */
  retryOnTimeout?: boolean;

  /**
   * Skip-on-failure logic, every target is eligible when not provided
   */
  healthObserver?: HealthObserver;

  /**
   * Gateway error (502/504) response writer
   */
  errorHandler?: ErrorHandler;

  /**
   * Proxy request headers to add/replace/remove
   */
  proxyRequestHeaders?: Headers;

  /**
   * Proxy response headers to add/replace/remove
   */
  responseHeaders?: Headers;

  /**
   * Hooks
   */
  on?: {
    beforeHTTPRequest?: (req: Request, res: Response, context: Context) => void;
    afterHTTPRequest?: (req: Request, res: Response, context: Context) => void;
    // after every relay attempt
    outcome?: (target: UpstreamTarget, outcome: Outcome, context: Context) => void;
  };

  /**
   * Log methods
   */
  log?: LogConfiguration;
}
