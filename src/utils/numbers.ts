import type { Money } from '../types/pipeline.js';

/**
 * Parses amounts as they come out of spreadsheet exports: `1234.56`,
 * `1.234,56`, `1,234.56`, `-$ 12,50`. Returns null when nothing numeric is left.
 */
export function parseNumber(value: unknown): number | null {
  if (value == null || value === '') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  let str = String(value).trim();
  if (!str) return null;
  const negative = /^\(.*\)$/.test(str) || str.includes('-');
  str = str.replace(/[^0-9,.]/g, '');
  if (!str) return null;

  const lastComma = str.lastIndexOf(',');
  const lastDot = str.lastIndexOf('.');
  if (lastComma > -1 && lastDot > -1) {
    str = lastComma > lastDot ? str.replace(/\./g, '').replace(',', '.') : str.replace(/,/g, '');
  } else if (lastComma > -1) {
    str = str.replace(/,/g, (_match, offset: number) => (offset === lastComma ? '.' : ''));
  }

  const parsed = Number(str);
  if (!Number.isFinite(parsed)) return null;
  return negative ? -parsed : parsed;
}

/** Fixed-point money keeps four decimals; output tables round to two. */
export const MONEY_SCALE = 10_000;

function roundHalfAway(value: number): number {
  const rounded = Math.round(Math.abs(value));
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

/** Rounds half away from zero, so a sale and its refund cancel. */
export function toMoney(amount: number): Money {
  return roundHalfAway(amount * MONEY_SCALE);
}

export function fromMoney(money: Money): number {
  return money / MONEY_SCALE;
}

/** Neumaier summation; keeps a long column of decimal floats from drifting. */
export function compensatedSum(values: Iterable<number>): number {
  let sum = 0;
  let compensation = 0;
  for (const value of values) {
    const next = sum + value;
    compensation += Math.abs(sum) >= Math.abs(value) ? sum - next + value : value - next + sum;
    sum = next;
  }
  return sum + compensation;
}

export function formatMoney(money: Money, decimalSeparator = '.'): string {
  const perCent = MONEY_SCALE / 100;
  const cents = Math.floor((Math.abs(money) + perCent / 2) / perCent);
  const sign = money < 0 && cents > 0 ? '-' : '';
  const units = Math.floor(cents / 100);
  const fraction = String(cents % 100).padStart(2, '0');
  return `${sign}${units}${decimalSeparator}${fraction}`;
}

export function formatRatio(value: number, decimalSeparator = '.', digits = 4): string {
  return value.toFixed(digits).replace('.', decimalSeparator);
}

export function safeRatio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}
