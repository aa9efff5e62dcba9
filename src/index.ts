export * from './Roundabout';
export * from './UpstreamPool';
export * from './UpstreamTarget';
export * from './Hooks';
export * from './interfaces';
export * from './errors';
export * from './handlers';
export * from './health';
export * from './config';
export { RequestUtils, createLogger } from './utils';
