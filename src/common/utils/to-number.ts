/**
 * class-transformer hook for numeric query params. "3abc" becomes NaN and
 * "1.5" stays a fraction, so `@IsInt()` rejects both.
 */
export const toNumber = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
