import { ProxyError } from './ProxyError';

/**
 * Fatal, prevents the proxy from starting
 */
export class ConfigurationError extends ProxyError {
  constructor(message: string) {
    super(message);
  }
}
