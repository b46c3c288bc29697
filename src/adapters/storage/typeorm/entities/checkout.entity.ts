import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  VersionColumn,
} from 'typeorm';
import { CheckoutState } from '../../../../core';

/**
 * TypeORM entity for Checkout
 */
@Entity('gateway_checkouts')
@Index(['state'])
@Index(['createdAt'])
@Index(['transactionId'])
export class CheckoutEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    type: 'enum',
    enum: CheckoutState,
    default: CheckoutState.AUTHORIZING,
  })
  state!: CheckoutState;

  @Column({ name: 'transaction_id', type: 'varchar', nullable: true })
  transactionId!: string | null;

  @Column({ name: 'paypal_email', type: 'varchar', nullable: true })
  paypalEmail!: string | null;

  @Column({ name: 'card_type', type: 'varchar', default: '' })
  cardType!: string;

  @Column({ name: 'last_digits', type: 'varchar', length: 4, nullable: true })
  lastDigits!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @VersionColumn({ name: 'version' })
  version!: number;
}
