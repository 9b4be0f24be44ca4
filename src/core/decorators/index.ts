import 'reflect-metadata';
import {
  Column as TypeORMColumn,
  Entity as TypeORMEntity,
  PrimaryColumn as TypeORMPrimaryColumn,
  PrimaryGeneratedColumn as TypeORMPrimaryGeneratedColumn
} from 'typeorm';

// Registry to store entity metadata
export class EntityRegistry {
  private static entities = new Set<Function>();

  static registerEntity(target: Function) {
    this.entities.add(target);
  }

  static getRegisteredEntities(): Function[] {
    return Array.from(this.entities);
  }
}

/**
 * Entity decorator that also registers the class, so a DbContext picks it
 * up without listing it in its options
 */
export function Entity(name?: string): ClassDecorator {
  return (target: Function) => {
    EntityRegistry.registerEntity(target);
    TypeORMEntity(name)(target);
  };
}

export const Column = TypeORMColumn;

export const PrimaryColumn = TypeORMPrimaryColumn;

export const PrimaryGeneratedColumn = TypeORMPrimaryGeneratedColumn;
