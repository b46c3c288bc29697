import { Money } from '../../src';

describe('Money', () => {
  it('should reject non-integer and negative amounts', () => {
    expect(() => new Money(10.5, 'USD')).toThrow(
      'Amount must be an integer (smallest currency unit)',
    );
    expect(() => new Money(-1, 'USD')).toThrow('Amount cannot be negative');
    expect(() => new Money(100, 'US')).toThrow(
      'Currency must be a 3-letter ISO 4217 code',
    );
  });

  it('should normalize currency to upper case', () => {
    expect(new Money(100, 'usd').currency).toBe('USD');
  });

  describe('fromMajorUnits', () => {
    it('should convert decimal strings to minor units', () => {
      expect(Money.fromMajorUnits('10.50', 'USD').amount).toBe(1050);
      expect(Money.fromMajorUnits('100.00', 'EUR').amount).toBe(10000);
      expect(Money.fromMajorUnits(19.99, 'USD').amount).toBe(1999);
    });

    it('should scale by the currency minor unit', () => {
      expect(Money.fromMajorUnits('1500', 'JPY').amount).toBe(1500);
      expect(Money.fromMajorUnits('1.250', 'KWD').amount).toBe(1250);
      expect(Money.fromMajorUnits('1500', 'JPY').toMajorUnits()).toBe(1500);
    });

    it('should round float artifacts', () => {
      expect(Money.fromMajorUnits('0.29', 'USD').amount).toBe(29);
    });

    it('should reject empty or non-numeric input', () => {
      expect(() => Money.fromMajorUnits('', 'USD')).toThrow('Invalid amount: ');
      expect(() => Money.fromMajorUnits('abc', 'USD')).toThrow(
        'Invalid amount: abc',
      );
    });
  });

  describe('distinctCount', () => {
    it('should collapse equal amounts', () => {
      expect(
        Money.distinctCount([
          new Money(10000, 'USD'),
          new Money(10000, 'usd'),
          Money.fromMajorUnits('100.00', 'USD'),
        ]),
      ).toBe(1);
    });

    it('should count differing amounts', () => {
      expect(
        Money.distinctCount([
          new Money(10000, 'USD'),
          new Money(10000, 'USD'),
          new Money(9500, 'USD'),
        ]),
      ).toBe(2);
    });

    it('should treat different currencies as distinct', () => {
      expect(
        Money.distinctCount([new Money(10000, 'USD'), new Money(10000, 'EUR')]),
      ).toBe(2);
    });
  });

  it('should serialize', () => {
    const money = new Money(2500, 'GBP');
    expect(money.toString()).toBe('GBP 2500');
    expect(money.toJSON()).toEqual({ amount: 2500, currency: 'GBP' });
    expect(money.toMajorUnits()).toBe(25);
  });
});
