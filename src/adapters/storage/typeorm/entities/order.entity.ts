import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PaymentEntity } from './payment.entity';

/**
 * TypeORM entity for Order (read-only from this service)
 */
@Entity('orders')
@Index(['number'], { unique: true })
export class OrderEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  number!: string;

  @Column({ type: 'bigint' })
  total!: string;

  @Column({ length: 3 })
  currency!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToMany(() => PaymentEntity, (payment) => payment.order)
  payments!: PaymentEntity[];
}
