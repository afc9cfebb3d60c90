// pattern: Functional Core

export type { ErrorKind, ToolFailure } from "./errors.js";
export {
  ToolError,
  ValidationError,
  NotFoundError,
  AuthError,
  TransientError,
  MalformedRecordError,
  ConversionError,
  ClientError,
  CancelledError,
  isToolError,
  toToolFailure,
} from "./errors.js";
