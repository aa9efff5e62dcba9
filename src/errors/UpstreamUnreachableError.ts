import { ProxyError } from './ProxyError';

export class UpstreamUnreachableError extends ProxyError {}
