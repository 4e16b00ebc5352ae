export type ErrorCode =
  | "invalid_request"
  | "post_not_found"
  | "comment_not_found"
  | "parent_not_found"
  | "already_liked"
  | "not_liked"
  | "max_nesting_exceeded"
  | "store_failure";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_request: 400,
  post_not_found: 404,
  comment_not_found: 404,
  parent_not_found: 404,
  already_liked: 409,
  not_liked: 409,
  max_nesting_exceeded: 422,
  store_failure: 500
};

const MESSAGE_BY_CODE: Record<ErrorCode, string> = {
  invalid_request: "Invalid request",
  post_not_found: "Post not found",
  comment_not_found: "Comment not found",
  parent_not_found: "Parent comment not found",
  already_liked: "Target already liked by user",
  not_liked: "Target not liked by user",
  max_nesting_exceeded: "Maximum comment nesting level reached",
  store_failure: "Store failure"
};

type ContentGraphErrorInput = {
  code: ErrorCode;
  message?: string;
  details?: string;
  cause?: unknown;
};

export class ContentGraphError extends Error {
  code: ErrorCode;
  details?: string;
  constructor(input: ContentGraphErrorInput) {
    super(input.message ?? MESSAGE_BY_CODE[input.code], { cause: input.cause });
    this.name = "ContentGraphError";
    this.code = input.code;
    this.details = input.details;
  }
}

export const isContentGraphError = (error: unknown, code?: ErrorCode): error is ContentGraphError =>
  error instanceof ContentGraphError && (code === undefined || error.code === code);

export const errorStatus = (code: ErrorCode) => STATUS_BY_CODE[code];

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};

// Boundary helper: store failures never leak their cause outside dev mode.
export const toErrorResponse = (error: unknown, options: { devMode?: boolean } = {}) => {
  if (error instanceof ContentGraphError) {
    const cause = error.cause instanceof Error ? error.cause.message : undefined;
    return {
      status: errorStatus(error.code),
      body: makeErrorResponse(error.code, error.message, {
        details: error.details,
        devMode: options.devMode,
        debug: cause ? { cause } : undefined
      })
    };
  }
  return {
    status: errorStatus("store_failure"),
    body: makeErrorResponse("store_failure", MESSAGE_BY_CODE.store_failure, {
      devMode: options.devMode,
      debug: error instanceof Error ? { cause: error.message } : undefined
    })
  };
};
