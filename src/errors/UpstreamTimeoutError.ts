import { ProxyError } from './ProxyError';

export class UpstreamTimeoutError extends ProxyError {}
