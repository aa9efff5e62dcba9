export * from './RequestUtils';
export * from './Timer';
export * from './Logger';
