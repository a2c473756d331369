import { TransformFnParams } from 'class-transformer';

/**
 * Query-string booleans arrive as 'true' / 'false'.
 */
export function toBoolean({ value }: TransformFnParams): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function trimString({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? value.trim() : value;
}
