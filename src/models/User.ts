import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../errors';
import { assertKeySafe } from './Transaction';

export interface User {
  id: string;
  email: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function newUser(input: { id?: string; email: string; name: string }, now: Date = new Date()): User {
  if (input.id !== undefined) assertKeySafe('id', input.id);
  const email = input.email.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(email)) {
    throw new ValidationError('a valid email is required');
  }
  const name = input.name.trim();
  if (!name) {
    throw new ValidationError('name is required');
  }

  return { id: input.id?.trim() || uuidv4(), email, name, createdAt: now, updatedAt: now };
}
