export * from './EnvironmentConfiguration';
