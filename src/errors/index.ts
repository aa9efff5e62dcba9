export * from './ProxyError';
export * from './ConfigurationError';
export * from './UpstreamUnreachableError';
export * from './UpstreamTimeoutError';
export * from './ClientDisconnectedError';
