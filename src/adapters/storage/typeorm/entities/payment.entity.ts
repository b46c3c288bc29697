import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { PaymentState } from '../../../../core';
import { OrderEntity } from './order.entity';

/**
 * TypeORM entity for Payment
 * Owned by the order subsystem; only `state` is written here
 */
@Entity('payments')
@Index(['sourceId'])
@Index(['orderId', 'state'])
export class PaymentEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'order_id', type: 'uuid' })
  orderId!: string;

  @Column({ name: 'source_id', type: 'uuid', nullable: true })
  sourceId!: string | null;

  @Column({
    type: 'enum',
    enum: PaymentState,
    default: PaymentState.CHECKOUT,
  })
  state!: PaymentState;

  @Column({ type: 'bigint' })
  amount!: string;

  @Column({ length: 3 })
  currency!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @ManyToOne(() => OrderEntity, (order) => order.payments)
  @JoinColumn({ name: 'order_id' })
  order!: OrderEntity;
}
