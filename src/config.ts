function envNumber(name: string, fallback: number): number {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

// widest bitmap (or tallest pixel height) a DIB block may declare
export const MaxImageDimension = envNumber('ICO_MAX_DIMENSION', 1024);

export const FetchTimeout = envNumber('ICO_FETCH_TIMEOUT', 30000);

export const UserAgent = process.env.ICO_USER_AGENT || 'ico-resources';
