import type { RejectionReason } from '../tcp/connectionLimits.js';

export type KvOp = 'set' | 'get' | 'delete';

// --- Client -> server ---

export interface SetRequest {
  id: number;
  op: 'set';
  key: string;
  value: string;
}

export interface GetRequest {
  id: number;
  op: 'get';
  key: string;
}

export interface DeleteRequest {
  id: number;
  op: 'delete';
  key: string;
}

export type KvRequest = SetRequest | GetRequest | DeleteRequest;

// --- Server -> client ---

export interface SetResponse {
  id: number;
  op: 'set';
}

export interface GetResponse {
  id: number;
  op: 'get';
  /** null when the key is absent */
  value: string | null;
}

export interface DeleteResponse {
  id: number;
  op: 'delete';
}

export type KvResponse = SetResponse | GetResponse | DeleteResponse;

/** Sent once on a connection the admission gate refused, just before it is ended. */
export interface RejectionNotice {
  op: 'rejected';
  reason: RejectionReason;
}

export type ServerMessage = KvResponse | RejectionNotice;
