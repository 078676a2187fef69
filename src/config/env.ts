export const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

export const toNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
};

export const toText = (value: string | undefined, defaultValue: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : defaultValue;
};

/** Comma-separated list; blank entries are dropped. Undefined when nothing is left. */
export const toList = (value: string | undefined): string[] | undefined => {
  if (!value) {
    return undefined;
  }

  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : undefined;
};
