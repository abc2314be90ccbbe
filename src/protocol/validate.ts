import type { KvRequest, RejectionNotice, ServerMessage } from './types.js';

type Obj = Record<string, unknown>;

function asObj(val: unknown): Obj | null {
  return typeof val === 'object' && val !== null && !Array.isArray(val) ? (val as Obj) : null;
}

function isId(val: unknown): val is number {
  return typeof val === 'number' && Number.isSafeInteger(val) && val >= 0;
}

export type ValidateResult<T> = { ok: true; message: T } | { ok: false; error: string };

export function validateRequest(raw: unknown): ValidateResult<KvRequest> {
  const obj = asObj(raw);
  if (!obj) return { ok: false, error: 'Request must be an object' };
  const { id, op, key, value } = obj;
  if (!isId(id)) return { ok: false, error: 'Request id must be a non-negative integer' };
  if (typeof key !== 'string') return { ok: false, error: 'Request key must be a string' };

  if (op === 'set') {
    if (typeof value !== 'string') {
      return { ok: false, error: 'set value must be a string' };
    }
    return { ok: true, message: { id, op, key, value } };
  }
  if (op === 'get' || op === 'delete') {
    return { ok: true, message: { id, op, key } };
  }
  return { ok: false, error: `Unknown op: ${String(op)}` };
}

function isRejectionNotice(obj: Obj): obj is Obj & RejectionNotice {
  return obj.op === 'rejected' && (obj.reason === 'total_limit' || obj.reason === 'address_limit');
}

export function validateServerMessage(raw: unknown): ValidateResult<ServerMessage> {
  const obj = asObj(raw);
  if (!obj) return { ok: false, error: 'Message must be an object' };
  if (obj.op === 'rejected') {
    if (isRejectionNotice(obj)) return { ok: true, message: { op: 'rejected', reason: obj.reason } };
    return { ok: false, error: 'Invalid rejected message' };
  }
  const { id, op, value } = obj;
  if (!isId(id)) return { ok: false, error: 'Response id must be a non-negative integer' };

  if (op === 'set' || op === 'delete') {
    return { ok: true, message: { id, op } };
  }
  if (op === 'get') {
    if (value === null || typeof value === 'string') {
      return { ok: true, message: { id, op, value } };
    }
    return { ok: false, error: 'get value must be a string or null' };
  }
  return { ok: false, error: `Unknown op: ${String(op)}` };
}
