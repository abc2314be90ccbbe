export { encodeFrame, createFrameDecoder } from './frames.js';
export type { KvOp, KvRequest, KvResponse, RejectionNotice } from './types.js';
export { validateServerMessage } from './validate.js';
