/**
 * Identity-key normalization. Every lookup, existence check, save and delete
 * of an identity key goes through `normalizeKey`: trimmed, lower-cased, and
 * `undefined` when blank.
 */

export const normalizeKey = (value: string | null | undefined): string | undefined => {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed.toLowerCase() : undefined;
};

export interface NameKey {
  firstName: string;
  lastName: string;
}

export const nameKey = (firstName: string | null | undefined, lastName: string | null | undefined): NameKey | undefined => {
  const first = normalizeKey(firstName);
  const last = normalizeKey(lastName);
  return first && last ? { firstName: first, lastName: last } : undefined;
};

export const matchesName = (entity: { firstName: string; lastName: string }, key: NameKey): boolean => {
  return normalizeKey(entity.firstName) === key.firstName && normalizeKey(entity.lastName) === key.lastName;
};

/**
 * Station numbers are compared and stored as text. All-digit values lose their
 * leading zeros so that "01" and "1" name the same station.
 */
export const canonicalStation = (value: string | number): string => {
  const trimmed = String(value).trim();
  return /^\d+$/.test(trimmed) ? trimmed.replace(/^0+(?=\d)/, '') : trimmed;
};
