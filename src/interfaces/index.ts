export * from './Configuration';
export * from './Context';
export * from './HealthObserver';
export * from './Outcome';
export * from './Request';
export * from './Response';
export * from './Server';
