export type UnknownRecord = Record<string, unknown>;

const FLIGHT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,31}$/;

// Epoch values above this are taken to be milliseconds rather than seconds.
const EPOCH_MILLIS_THRESHOLD = 100_000_000_000;

export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const toNullableString = (value: unknown): string | null => {
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();

  return trimmed.length > 0 ? trimmed : null;
};

export const toNullableNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = Number(trimmed);

  return Number.isFinite(parsed) ? parsed : null;
};

export const toNullableBoolean = (value: unknown): boolean | null => {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) {
      return true;
    }

    if (['false', '0', 'no'].includes(normalized)) {
      return false;
    }
  }

  return null;
};

export const toNullableDate = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const numeric = toNullableNumber(value);
  if (numeric !== null) {
    if (numeric <= 0) {
      return null;
    }

    const date = new Date(numeric >= EPOCH_MILLIS_THRESHOLD ? numeric : numeric * 1000);

    return Number.isNaN(date.getTime()) ? null : date;
  }

  const text = toNullableString(value);
  if (!text) {
    return null;
  }

  const parsed = Date.parse(text);

  return Number.isNaN(parsed) ? null : new Date(parsed);
};

export const pickFirst = (record: UnknownRecord, keys: readonly string[]): unknown => {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }

  return undefined;
};

export const normalizeFlightId = (value: unknown): string => {
  if (typeof value !== 'string') {
    return '';
  }

  return value.trim().toLowerCase();
};

export const isValidFlightId = (value: string): boolean => FLIGHT_ID_PATTERN.test(value);

export const feetToMetres = (feet: number): number => feet * 0.3048;

export const knotsToMetresPerSecond = (knots: number): number => (knots * 1852) / 3600;

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;

  return Math.round(value * factor) / factor;
};
