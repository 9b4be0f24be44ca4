export * from './root';
export * from './scope';
