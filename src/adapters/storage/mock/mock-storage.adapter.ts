import { v4 as uuidv4 } from 'uuid';
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
  PaymentState,
  Money,
  StaleCheckoutError,
  TerminalCheckoutError,
  isFinalState,
} from '../../../core';

export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}

interface CheckoutRecord {
  id: string;
  state: CheckoutState;
  transactionId: string | null;
  paypalEmail: string | null;
  cardType: string;
  lastDigits: string | null;
  createdAt: Date;
  updatedAt: Date;
}

interface PaymentRecord {
  id: string;
  orderId: string;
  sourceId: string | null;
  state: PaymentState;
  amount: number;
  currency: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Seed data for a checkout; unspecified fields get defaults
 */
export type SeedCheckout = Partial<CheckoutRecord>;

export interface SeedPayment {
  id?: string;
  orderId: string;
  sourceId?: string | null;
  state?: PaymentState;
  amount: Money;
}

export interface SeedOrder {
  id?: string;
  number?: string;
  total: Money;
}

/**
 * Mock storage adapter for testing
 * In-memory storage with deterministic behavior. Records are stored as
 * snapshots, so callers never hold a live reference to stored state.
 */
export class MockStorageAdapter implements StorageAdapter {
  private checkouts: Map<string, CheckoutRecord> = new Map();
  private payments: Map<string, PaymentRecord> = new Map();
  private orders: Map<string, Order> = new Map();

  private readonly options: Required<MockStorageOptions>;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  // ==================== Checkout Operations ====================

  async createCheckout(dto: CreateCheckoutDto): Promise<Checkout> {
    await this.simulateLatency();

    return this.seedCheckout({
      state: dto.state,
      transactionId: dto.transactionId ?? null,
      paypalEmail: dto.paypalEmail ?? null,
      cardType: dto.cardType,
      lastDigits: dto.lastDigits ?? null,
    });
  }

  async findCheckout(id: string): Promise<Checkout | null> {
    await this.simulateLatency();
    const record = this.checkouts.get(id);
    return record ? toCheckout(record) : null;
  }

  async findCheckouts(
    query: CheckoutQuery,
    page?: KeysetPage,
  ): Promise<Checkout[]> {
    await this.simulateLatency();

    let records = Array.from(this.checkouts.values())
      .filter((record) => matchesQuery(record, query))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    if (page?.afterId !== undefined) {
      const afterId = page.afterId;
      records = records.filter((record) => record.id > afterId);
    }
    if (page) {
      records = records.slice(0, page.limit);
    }

    return records.map(toCheckout);
  }

  async updateCheckoutState(
    id: string,
    expected: CheckoutState,
    next: CheckoutState,
  ): Promise<CheckoutStateChange> {
    await this.simulateLatency();

    const record = this.checkouts.get(id);
    if (!record) {
      throw new Error(`Checkout not found: ${id}`);
    }
    if (isFinalState(record.state)) {
      throw new TerminalCheckoutError(id, record.state);
    }
    if (record.state !== expected) {
      throw new StaleCheckoutError(id, expected, record.state);
    }

    record.state = next;
    record.updatedAt = new Date();

    return { checkoutId: id, previousState: expected, state: next };
  }

  async linkCheckoutTransaction(
    id: string,
    transactionId: string,
  ): Promise<Checkout> {
    await this.simulateLatency();

    const record = this.checkouts.get(id);
    if (!record) {
      throw new Error(`Checkout not found: ${id}`);
    }

    const checkout = toCheckout(record);
    checkout.linkTransaction(transactionId);
    record.transactionId = checkout.transactionId;
    record.updatedAt = checkout.updatedAt;

    return checkout;
  }

  // ==================== Payment / Order Operations ====================

  async findPaymentBySource(checkoutId: string): Promise<Payment | null> {
    await this.simulateLatency();

    for (const record of this.payments.values()) {
      if (record.sourceId === checkoutId) {
        return toPayment(record);
      }
    }
    return null;
  }

  async savePayment(payment: Payment): Promise<Payment> {
    await this.simulateLatency();

    const record = this.payments.get(payment.id);
    if (!record) {
      throw new Error(`Payment not found: ${payment.id}`);
    }

    record.state = payment.state;
    record.updatedAt = payment.updatedAt;
    return toPayment(record);
  }

  async findOrder(orderId: string): Promise<Order | null> {
    await this.simulateLatency();
    return this.orders.get(orderId) ?? null;
  }

  /**
   * Snapshot records before `work` and restore them if it throws
   */
  async withTransaction<T>(
    work: (storage: StorageAdapter) => Promise<T>,
  ): Promise<T> {
    const checkouts = new Map(
      Array.from(this.checkouts, ([id, record]) => [id, { ...record }]),
    );
    const payments = new Map(
      Array.from(this.payments, ([id, record]) => [id, { ...record }]),
    );

    try {
      return await work(this);
    } catch (error) {
      this.checkouts = checkouts;
      this.payments = payments;
      throw error;
    }
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  // ==================== Seeding Helpers ====================

  seedCheckout(seed: SeedCheckout = {}): Checkout {
    const now = new Date();
    const record: CheckoutRecord = {
      id: seed.id ?? uuidv4(),
      state: seed.state ?? CheckoutState.AUTHORIZING,
      transactionId: seed.transactionId ?? null,
      paypalEmail: seed.paypalEmail ?? null,
      cardType: seed.cardType ?? '',
      lastDigits: seed.lastDigits ?? null,
      createdAt: seed.createdAt ?? now,
      updatedAt: seed.updatedAt ?? now,
    };
    this.checkouts.set(record.id, record);
    return toCheckout(record);
  }

  seedPayment(seed: SeedPayment): Payment {
    const now = new Date();
    const record: PaymentRecord = {
      id: seed.id ?? uuidv4(),
      orderId: seed.orderId,
      sourceId: seed.sourceId ?? null,
      state: seed.state ?? PaymentState.CHECKOUT,
      amount: seed.amount.amount,
      currency: seed.amount.currency,
      createdAt: now,
      updatedAt: now,
    };
    this.payments.set(record.id, record);
    return toPayment(record);
  }

  seedOrder(seed: SeedOrder): Order {
    const id = seed.id ?? uuidv4();
    const order = new Order(id, seed.number ?? `R${id.slice(0, 8)}`, seed.total);
    this.orders.set(id, order);
    return order;
  }

  /**
   * Current stored payment state, bypassing domain hydration
   */
  paymentState(paymentId: string): PaymentState | undefined {
    return this.payments.get(paymentId)?.state;
  }

  checkoutState(checkoutId: string): CheckoutState | undefined {
    return this.checkouts.get(checkoutId)?.state;
  }

  clear(): void {
    this.checkouts.clear();
    this.payments.clear();
    this.orders.clear();
  }
}

function matchesQuery(record: CheckoutRecord, query: CheckoutQuery): boolean {
  if (query.states && !query.states.includes(record.state)) {
    return false;
  }
  if (query.statesNotIn && query.statesNotIn.includes(record.state)) {
    return false;
  }
  if (query.createdAfter && record.createdAt < query.createdAfter) {
    return false;
  }
  if (query.createdBefore && record.createdAt > query.createdBefore) {
    return false;
  }
  if (query.hasPaypalEmail !== undefined) {
    const hasEmail = record.paypalEmail !== null;
    if (hasEmail !== query.hasPaypalEmail) {
      return false;
    }
  }
  return true;
}

function toCheckout(record: CheckoutRecord): Checkout {
  return new Checkout(
    record.id,
    record.state,
    record.transactionId,
    record.paypalEmail,
    record.cardType,
    record.lastDigits,
    record.createdAt,
    record.updatedAt,
  );
}

function toPayment(record: PaymentRecord): Payment {
  return new Payment(
    record.id,
    record.orderId,
    record.sourceId,
    record.state,
    new Money(record.amount, record.currency),
    record.createdAt,
    record.updatedAt,
  );
}
