import { Roundabout, type Configuration, type Context, type OutcomeType } from '../../src';

export interface LoggedError {
  message: string;
  error?: Error | null;
}

export class TestProxy {
  public static readonly HOST = '127.0.0.1';

  private proxy: Roundabout | null = null;

  // outcome types of every relay attempt, in order
  public readonly outcomes: OutcomeType[] = [];
  public readonly errors: LoggedError[] = [];
  public readonly completed: Context[] = [];

  constructor(
    private upstream: string[],
    private configOverride: Partial<Configuration> = {},
  ) {}

  public get url(): string {
    const address = this.proxy?.address;
    if (!address) {
      throw new Error('TestProxy is not running');
    }

    const scheme = this.configOverride.secure ? 'https' : 'http';

    return `${scheme}://${TestProxy.HOST}:${address.port}`;
  }

  /**
   * Start proxy server
   */
  public async start(): Promise<void> {
    this.proxy = new Roundabout({
      hostname: TestProxy.HOST,
      port: 0,
      upstream: this.upstream,
      log: {
        error: (context, message, error) => {
          this.errors.push({ message, error });
        },
      },
      on: {
        outcome: (target, outcome) => {
          this.outcomes.push(outcome.type);
        },
        afterHTTPRequest: (req, res, context) => {
          this.completed.push({ ...context });
        },
      },

      ...this.configOverride,
    });

    await this.proxy.start();
  }

  /**
   * Stop proxy server
   */
  public async stop(force = false): Promise<void> {
    await this.proxy?.stop(force);
  }
}
