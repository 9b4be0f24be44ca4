import { Column, Entity, PrimaryColumn } from '../core/decorators';

@Entity('customers')
export class CustomerRow {
  @PrimaryColumn()
  customerId!: string;

  @Column()
  companyName!: string;

  @Column({ type: 'varchar', nullable: true })
  country!: string | null;
}
