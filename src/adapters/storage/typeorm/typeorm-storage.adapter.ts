import { DataSource, Repository, EntityManager } from 'typeorm';
import {
  StorageAdapter,
  Checkout,
  CheckoutStateChange,
  CheckoutState,
  CheckoutQuery,
  CreateCheckoutDto,
  KeysetPage,
  Order,
  Payment,
  Money,
  StaleCheckoutError,
  TerminalCheckoutError,
  isFinalState,
} from '../../../core';
import { CheckoutEntity, PaymentEntity, OrderEntity } from './entities';

/**
 * TypeORM implementation of StorageAdapter for PostgreSQL
 *
 * An adapter built with an EntityManager is bound to that manager's
 * transaction; every operation on it joins the transaction.
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private checkoutRepo: Repository<CheckoutEntity>;
  private paymentRepo: Repository<PaymentEntity>;
  private orderRepo: Repository<OrderEntity>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly manager?: EntityManager,
  ) {
    const source = manager ?? dataSource.manager;
    this.checkoutRepo = source.getRepository(CheckoutEntity);
    this.paymentRepo = source.getRepository(PaymentEntity);
    this.orderRepo = source.getRepository(OrderEntity);
  }

  /**
   * Checkout Management
   */

  async createCheckout(dto: CreateCheckoutDto): Promise<Checkout> {
    const entity = this.checkoutRepo.create({
      state: dto.state ?? CheckoutState.AUTHORIZING,
      transactionId: dto.transactionId ?? null,
      paypalEmail: dto.paypalEmail ?? null,
      cardType: dto.cardType,
      lastDigits: dto.lastDigits ?? null,
    });

    const saved = await this.checkoutRepo.save(entity);
    return this.mapCheckoutEntityToDomain(saved);
  }

  async findCheckout(id: string): Promise<Checkout | null> {
    const entity = await this.checkoutRepo.findOne({ where: { id } });
    return entity ? this.mapCheckoutEntityToDomain(entity) : null;
  }

  async findCheckouts(
    query: CheckoutQuery,
    page?: KeysetPage,
  ): Promise<Checkout[]> {
    if (query.states && query.states.length === 0) {
      return [];
    }

    const qb = this.checkoutRepo.createQueryBuilder('c');

    if (query.states) {
      qb.andWhere('c.state IN (:...states)', { states: [...query.states] });
    }
    if (query.statesNotIn && query.statesNotIn.length > 0) {
      qb.andWhere('c.state NOT IN (:...statesNotIn)', {
        statesNotIn: [...query.statesNotIn],
      });
    }
    if (query.createdAfter) {
      qb.andWhere('c.created_at >= :createdAfter', {
        createdAfter: query.createdAfter,
      });
    }
    if (query.createdBefore) {
      qb.andWhere('c.created_at <= :createdBefore', {
        createdBefore: query.createdBefore,
      });
    }
    if (query.hasPaypalEmail === true) {
      qb.andWhere('c.paypal_email IS NOT NULL');
    } else if (query.hasPaypalEmail === false) {
      qb.andWhere('c.paypal_email IS NULL');
    }
    if (page?.afterId) {
      qb.andWhere('c.id > :afterId', { afterId: page.afterId });
    }

    qb.orderBy('c.id', 'ASC');
    if (page) {
      qb.take(page.limit);
    }

    const entities = await qb.getMany();
    return entities.map((e) => this.mapCheckoutEntityToDomain(e));
  }

  async updateCheckoutState(
    id: string,
    expected: CheckoutState,
    next: CheckoutState,
  ): Promise<CheckoutStateChange> {
    return await this.runInTransaction(async (manager) => {
      // Use pessimistic locking to prevent concurrent updates
      const entity = await manager.findOne(CheckoutEntity, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });

      if (!entity) {
        throw new Error(`Checkout not found: ${id}`);
      }
      if (isFinalState(entity.state)) {
        throw new TerminalCheckoutError(id, entity.state);
      }
      if (entity.state !== expected) {
        throw new StaleCheckoutError(id, expected, entity.state);
      }

      entity.state = next;
      await manager.save(entity);

      return { checkoutId: id, previousState: expected, state: next };
    });
  }

  async linkCheckoutTransaction(
    id: string,
    transactionId: string,
  ): Promise<Checkout> {
    return await this.runInTransaction(async (manager) => {
      const entity = await manager.findOne(CheckoutEntity, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });

      if (!entity) {
        throw new Error(`Checkout not found: ${id}`);
      }

      const checkout = this.mapCheckoutEntityToDomain(entity);
      checkout.linkTransaction(transactionId);

      entity.transactionId = checkout.transactionId;
      const updated = await manager.save(entity);
      return this.mapCheckoutEntityToDomain(updated);
    });
  }

  /**
   * Payment / Order Management
   */

  async findPaymentBySource(checkoutId: string): Promise<Payment | null> {
    const entity = await this.paymentRepo.findOne({
      where: { sourceId: checkoutId },
      order: { createdAt: 'ASC' },
    });
    return entity ? this.mapPaymentEntityToDomain(entity) : null;
  }

  async savePayment(payment: Payment): Promise<Payment> {
    const result = await this.paymentRepo.update(payment.id, {
      state: payment.state,
    });

    if (result.affected === 0) {
      throw new Error(`Payment not found: ${payment.id}`);
    }

    const entity = await this.paymentRepo.findOneOrFail({
      where: { id: payment.id },
    });
    return this.mapPaymentEntityToDomain(entity);
  }

  async findOrder(orderId: string): Promise<Order | null> {
    const entity = await this.orderRepo.findOne({ where: { id: orderId } });
    return entity ? this.mapOrderEntityToDomain(entity) : null;
  }

  /**
   * Execute operations within a database transaction
   */
  async withTransaction<T>(
    work: (storage: StorageAdapter) => Promise<T>,
  ): Promise<T> {
    return await this.runInTransaction((manager) =>
      work(new TypeORMStorageAdapter(this.dataSource, manager)),
    );
  }

  private async runInTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    if (this.manager) {
      return await callback(this.manager);
    }

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Entity mapping
   */

  mapCheckoutEntityToDomain(entity: CheckoutEntity): Checkout {
    return new Checkout(
      entity.id,
      entity.state,
      entity.transactionId,
      entity.paypalEmail,
      entity.cardType,
      entity.lastDigits,
      entity.createdAt,
      entity.updatedAt,
    );
  }

  mapPaymentEntityToDomain(entity: PaymentEntity): Payment {
    return new Payment(
      entity.id,
      entity.orderId,
      entity.sourceId,
      entity.state,
      new Money(Number(entity.amount), entity.currency),
      entity.createdAt,
      entity.updatedAt,
    );
  }

  mapOrderEntityToDomain(entity: OrderEntity): Order {
    return new Order(
      entity.id,
      entity.number,
      new Money(Number(entity.total), entity.currency),
      entity.createdAt,
    );
  }
}
