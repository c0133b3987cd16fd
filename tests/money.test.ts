import {
  compareMoney,
  isNegative,
  moneyTransformer,
  multiplyMoney,
  roundMoney,
  subtractMoney,
  sumMoney,
  toPaise
} from '../src/lib/money';
import { ValidationError } from '../src/lib/errors';

describe('money', () => {
  describe('toPaise', () => {
    it('reads decimal strings exactly', () => {
      expect(toPaise('1250.50')).toBe(125050);
      expect(toPaise('7')).toBe(700);
      expect(toPaise('-0.00')).toBe(0);
    });

    it('reads numbers through their fixed-point form', () => {
      expect(toPaise(0.1)).toBe(10);
      expect(toPaise(19.99)).toBe(1999);
    });

    it('rejects text that is not a number', () => {
      expect(() => toPaise('12,50')).toThrow(new ValidationError('Amount must be a decimal number'));
      expect(() => toPaise(Number.NaN, 'Rate')).toThrow('Rate must be a finite number');
    });
  });

  describe('roundMoney', () => {
    it('rounds the third decimal half to even', () => {
      expect(roundMoney('10.005')).toBe('10.00');
      expect(roundMoney('10.015')).toBe('10.02');
      expect(roundMoney('10.0051')).toBe('10.01');
      expect(roundMoney('10.004')).toBe('10.00');
    });

    it('pads to two fraction digits', () => {
      expect(roundMoney('5')).toBe('5.00');
      expect(roundMoney('5.5')).toBe('5.50');
    });

    it('rejects amounts a money column cannot hold', () => {
      expect(roundMoney('99999999.99')).toBe('99999999.99');
      expect(() => roundMoney('100000000.00', 'Amount')).toThrow(new ValidationError('Amount cannot exceed 99999999.99'));
      expect(() => roundMoney(-100000000, 'Rate')).toThrow('Rate cannot exceed 99999999.99');
    });
  });

  it('sums without floating point drift', () => {
    expect(sumMoney(['0.10', '0.20'])).toBe('0.30');
    expect(sumMoney([])).toBe('0.00');
    expect(sumMoney(['100.00', 250, '0.05'])).toBe('350.05');
  });

  it('multiplies a rate by a whole quantity', () => {
    expect(multiplyMoney('100.00', 4)).toBe('400.00');
    expect(multiplyMoney('33.33', 3)).toBe('99.99');
    expect(() => multiplyMoney('10.00', 1.5)).toThrow('Quantity must be a whole number');
  });

  it('goes negative when payments exceed charges', () => {
    expect(subtractMoney('100.00', '5000.00')).toBe('-4900.00');
    expect(isNegative('-0.01')).toBe(true);
    expect(isNegative('0.00')).toBe(false);
  });

  it('compares amounts across representations', () => {
    expect(compareMoney('1.00', 1)).toBe(0);
    expect(compareMoney('2.50', '2.49')).toBe(1);
    expect(compareMoney(0, '0.01')).toBe(-1);
  });

  it('normalizes decimal columns from either driver', () => {
    expect(moneyTransformer.from(400)).toBe('400.00');
    expect(moneyTransformer.from('1250.5')).toBe('1250.50');
    expect(moneyTransformer.from(null)).toBeNull();
    expect(moneyTransformer.to('99.999')).toBe('100.00');
  });
});
