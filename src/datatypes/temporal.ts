import type * as AST from '../types.js';

// 时间类字面量的格式校验（ISO 8601 子集）

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{2}):(\d{2}):(\d{2})(?:\.\d{1,9})?$/;
const OFFSET_RE = /^(?:Z|[+-](\d{2}):(\d{2}))$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidDate(value: string): boolean {
  const m = DATE_RE.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

export function isValidTime(value: string): boolean {
  const m = TIME_RE.exec(value);
  if (!m) return false;
  return Number(m[1]) <= 23 && Number(m[2]) <= 59 && Number(m[3]) <= 59;
}

export function isValidDateTime(value: string): boolean {
  const sep = value.indexOf('T');
  if (sep < 0) return false;
  return isValidDate(value.slice(0, sep)) && isValidTime(value.slice(sep + 1));
}

export function isValidTimestamp(value: string): boolean {
  const offsetStart = value.search(/(?:Z|[+-]\d{2}:\d{2})$/);
  if (offsetStart < 0) return isValidDateTime(value);
  const offset = OFFSET_RE.exec(value.slice(offsetStart));
  if (!offset) return false;
  if (offset[1] !== undefined && (Number(offset[1]) > 23 || Number(offset[2]) > 59)) return false;
  return isValidDateTime(value.slice(0, offsetStart));
}

const FORMATS: Readonly<Record<AST.TemporalKind, string>> = {
  Date: 'YYYY-MM-DD',
  Time: 'HH:MM:SS[.fraction]',
  DateTime: 'YYYY-MM-DDTHH:MM:SS[.fraction]',
  Timestamp: 'YYYY-MM-DDTHH:MM:SS[.fraction][Z|±HH:MM]',
};

export function temporalFormat(kind: AST.TemporalKind): string {
  return FORMATS[kind];
}

export function isValidTemporal(kind: AST.TemporalKind, value: string): boolean {
  switch (kind) {
    case 'Date':
      return isValidDate(value);
    case 'Time':
      return isValidTime(value);
    case 'DateTime':
      return isValidDateTime(value);
    case 'Timestamp':
      return isValidTimestamp(value);
  }
}
