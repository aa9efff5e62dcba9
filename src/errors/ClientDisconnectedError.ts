import { ProxyError } from './ProxyError';

// not a failure, used to cancel the upstream leg
export class ClientDisconnectedError extends ProxyError {}
