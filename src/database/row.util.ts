import Decimal from 'decimal.js';
import { parseAmount } from '../common/utils/decimal.util';
import { Row } from './queryable.interface';

// pg returns NUMERIC as string and TIMESTAMPTZ as Date.

export function readString(row: Row, column: string): string {
  const value = row[column];
  return typeof value === 'string' ? value : String(value ?? '');
}

export function readDecimal(row: Row, column: string): Decimal {
  return parseAmount(row[column]);
}

export function readDate(row: Row, column: string): Date {
  const value = row[column];
  if (value instanceof Date) {
    return value;
  }
  return new Date(typeof value === 'string' || typeof value === 'number' ? value : 0);
}
