import { Money } from '../value-objects/money.vo';

/**
 * Order as seen by the reconciliation engine - only the total matters here
 */
export class Order {
  constructor(
    public readonly id: string,
    public readonly number: string,
    public readonly total: Money,
    public readonly createdAt: Date = new Date(),
  ) {}
}
