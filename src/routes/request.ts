import type { Request } from 'express';
import { ValidationError } from '../errors';
import { parseWireDate } from '../models/codec';
import type { PageRequest } from '../repository/financeRepository';

export type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function bodyOf(req: Request): Body {
  const body: unknown = req.body;
  if (!isBody(body)) throw new ValidationError('request body must be a JSON object');
  return body;
}

export function bodyList(req: Request, field: string): Body[] {
  const body: unknown = req.body;
  const list: unknown = Array.isArray(body) ? body : isBody(body) ? body[field] : undefined;
  if (!Array.isArray(list)) {
    throw new ValidationError(`${field} must be an array`);
  }
  return list.map((entry: unknown, position) => {
    if (!isBody(entry)) throw new ValidationError(`${field}[${position}] must be an object`);
    return entry;
  });
}

export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

export function requireString(body: Body, field: string): string {
  const value = optionalString(body, field);
  if (value === undefined || !value.trim()) throw new ValidationError(`${field} is required`);
  return value;
}

export function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  const number = typeof value === 'string' && value.trim() ? Number(value) : value;
  if (typeof number !== 'number' || !Number.isFinite(number)) {
    throw new ValidationError(`${field} must be a number`);
  }
  return number;
}

export function requireNumber(body: Body, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) throw new ValidationError(`${field} is required`);
  return value;
}

export function requireDate(body: Body, field: string): Date {
  const text = requireString(body, field);
  const date = parseWireDate(text);
  if (!date) throw new ValidationError(`${field} must be YYYY-MM-DD or an RFC3339 timestamp, got "${text}"`);
  return date;
}

export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function queryFlag(req: Request, name: string): boolean {
  return queryString(req, name)?.toLowerCase() === 'true';
}

/** The acting user comes from `user_id`, in the query string or the body. */
export function userIdOf(req: Request): string {
  const fromQuery = queryString(req, 'user_id');
  if (fromQuery) return fromQuery;

  const body: unknown = req.body;
  if (isBody(body)) {
    const fromBody = body.user_id;
    if (typeof fromBody === 'string' && fromBody.trim()) return fromBody.trim();
  }
  throw new ValidationError('user_id is required');
}

export function pageOf(req: Request): PageRequest {
  const rawLimit = queryString(req, 'limit');
  let limit: number | undefined;
  if (rawLimit !== undefined) {
    limit = Number(rawLimit);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`limit must be a positive integer, got "${rawLimit}"`);
    }
  }
  return { limit, cursor: queryString(req, 'cursor') };
}
