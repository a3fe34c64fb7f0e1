import { ValidationError } from '../errors';
import type { StoreItem } from './types';

/** Position of the last item returned, keyed by the index's ordering attributes. */
export type CursorPosition = Record<string, string>;

export function encodeCursor(position: CursorPosition): string {
  return Buffer.from(JSON.stringify(position), 'utf8').toString('base64url');
}

export function decodeCursor(cursor: string, attributes: string[]): CursorPosition {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch (error) {
    throw new ValidationError('invalid pagination cursor', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('invalid pagination cursor');
  }

  const position: CursorPosition = {};
  for (const attribute of attributes) {
    const value: unknown = Reflect.get(parsed, attribute);
    if (typeof value !== 'string') {
      throw new ValidationError(`invalid pagination cursor: missing ${attribute}`);
    }
    position[attribute] = value;
  }
  return position;
}

export function positionOf(item: StoreItem, attributes: string[]): CursorPosition {
  const position: CursorPosition = {};
  for (const attribute of attributes) {
    const value = item[attribute];
    position[attribute] = typeof value === 'string' ? value : '';
  }
  return position;
}
