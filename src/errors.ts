import type { RejectionReason } from './tcp/connectionLimits.js';

export const ErrorCode = {
  // Connection
  CONNECTION_REJECTED: 'CONNECTION_REJECTED',
  CONNECTION_CLOSED: 'CONNECTION_CLOSED',

  // Protocol
  BAD_FRAME: 'BAD_FRAME',
  BAD_MESSAGE: 'BAD_MESSAGE',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class KvError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string
  ) {
    super(message);
    this.name = 'KvError';
  }
}

/** The server refused the connection at admission time. */
export class ConnectionRejectedError extends KvError {
  constructor(public readonly reason: RejectionReason) {
    super(ErrorCode.CONNECTION_REJECTED, `connection rejected: ${reason}`);
    this.name = 'ConnectionRejectedError';
  }
}

export class ConnectionClosedError extends KvError {
  constructor(message = 'connection closed') {
    super(ErrorCode.CONNECTION_CLOSED, message);
    this.name = 'ConnectionClosedError';
  }
}

export class FrameError extends KvError {
  constructor(message: string) {
    super(ErrorCode.BAD_FRAME, message);
    this.name = 'FrameError';
  }
}
