export * from './commands';
export * from './entity';
export * from './handlers';
export * from './queries';
export * from './seed';
export * from './service';
export * from './sql';
export * from './types';
