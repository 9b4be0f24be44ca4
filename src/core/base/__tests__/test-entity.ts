import { Column, Entity, PrimaryGeneratedColumn } from '../../decorators';

@Entity('test_entities')
export class TestEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  name!: string;

  @Column({ type: 'varchar', nullable: true })
  description!: string | null;
}

@Entity('test_entities')
export class ShadowTestEntity {
  @PrimaryGeneratedColumn()
  id!: number;
}
