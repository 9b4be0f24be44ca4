/**
 * Type for entity constructor
 */
export type EntityType<T> = { new (...args: any[]): T };
