export {
  ContentGraphError,
  errorStatus,
  isContentGraphError,
  makeErrorResponse,
  toErrorResponse
} from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { PageQuerySchema, normalizePage } from "./pagination.js";
export type { Page, PageQuery } from "./pagination.js";
