/**
 * @apiprobe/executor
 *
 * Request construction and HTTP execution for apiprobe.
 */

// Types
export type {
  TransportErrorPolicy,
  FetchLike,
  PreparedRequest,
  WireBody,
  HttpSessionConfig,
  ProbeResult,
} from './types.js';

export { DEFAULT_SESSION_CONFIG } from './types.js';

// Request builder
export { buildFormFields, buildRequest, joinUrl, encodeBody } from './request-builder.js';

// Session
export { HttpSession, createHttpSession, parseJsonBody } from './http-session.js';
