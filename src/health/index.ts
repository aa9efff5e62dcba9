export * from './NoopHealthObserver';
export * from './FailureThresholdHealthObserver';
