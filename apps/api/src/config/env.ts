export type Env = Record<string, string | undefined>;

type Booleanish = string | undefined | null;

export const normalizeBoolean = (value: Booleanish, fallback: boolean): boolean => {
  if (value === undefined || value === null) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
};

export const normalizeString = (value: string | undefined | null): string | null => {
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const normalizePositiveInteger = (value: string | undefined | null): number | null => {
  const parsed = normalizeInteger(value);
  return parsed !== null && parsed > 0 ? parsed : null;
};

/** Parses a base-10 integer; anything else, including blanks, is null. */
export const normalizeInteger = (value: string | undefined | null): number | null => {
  const trimmed = normalizeString(value);
  if (!trimmed || !/^-?\d+$/.test(trimmed)) {
    return null;
  }

  const parsed = Number.parseInt(trimmed, 10);
  return Number.isFinite(parsed) ? parsed : null;
};

export const normalizeList = (value: string | undefined | null): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
