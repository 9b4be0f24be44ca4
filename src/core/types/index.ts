export * from './connection';
export * from './cqrs';
export * from './entity';
export * from './options';
