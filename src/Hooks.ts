import type { Configuration, Context, LogConfiguration, Outcome, Request, Response } from './interfaces';
import type { UpstreamTarget } from './UpstreamTarget';

export class Hooks {
  private static LOG_CLASS = 'roundabout/hooks';

  constructor(
    private log: Required<LogConfiguration>,
    private configuration: Configuration,
  ) {}

  /**
   * On before HTTP/1.1 request
   * @param path
   * @param req
   * @param res
   * @param context
   */
  onBeforeHttpRequest(path: string, req: Request, res: Response, context: Context): void {
    try {
      this.log.debug(context, 'New HTTP/1.1 request', {
        class: Hooks.LOG_CLASS,
        path,
        method: req.method,
      });
      this.configuration.on?.beforeHTTPRequest?.(req, res, context);
    } catch (e) {
      this.log.error(context, 'beforeHTTPRequest hook error', Hooks.toError(e), {
        class: Hooks.LOG_CLASS,
        method: req.method,
        path,
      });
    }
  }

  /**
   * On after HTTP/1.1 request
   * @param path
   * @param req
   * @param res
   * @param context
   */
  onAfterHttpRequest(path: string, req: Request, res: Response, context: Context): void {
    try {
      this.log.debug(context, 'HTTP/1.1 request completed', {
        class: Hooks.LOG_CLASS,
        path,
        method: req.method,
        state: context.state,
      });
      this.configuration.on?.afterHTTPRequest?.(req, res, context);
    } catch (e) {
      this.log.error(context, 'afterHTTPRequest hook error', Hooks.toError(e), {
        class: Hooks.LOG_CLASS,
        method: req.method,
        path,
      });
    }
  }

  /**
   * On relay attempt outcome
   * @param target
   * @param outcome
   * @param context
   */
  onOutcome(target: UpstreamTarget, outcome: Outcome, context: Context): void {
    try {
      this.configuration.on?.outcome?.(target, outcome, context);
    } catch (e) {
      this.log.error(context, 'outcome hook error', Hooks.toError(e), {
        class: Hooks.LOG_CLASS,
        target: target.address,
        outcome: outcome.type,
      });
    }
  }

  private static toError(e: unknown): Error {
    return e instanceof Error ? e : new Error(String(e));
  }
}
