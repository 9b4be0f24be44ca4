export * from './connection';
export * from './counter';
export * from './handlers';
