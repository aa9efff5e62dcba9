export * from './ConnectionForwarder';
