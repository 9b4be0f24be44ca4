import 'reflect-metadata';

// Re-export core functionality
export * from './core/base/connection';
export * from './core/base/context';
export * from './core/config';
export * from './core/decorators';
export * from './core/errors';
export * from './core/types';

// Re-export CQRS functionality
export * from './command/executor';
export * from './query/executor';

// Re-export transaction functionality
export * from './transactions';

// Re-export the customers sample and its wiring
export * from './composition';
export * from './customers';

// Re-export express integration
export * from './express';
