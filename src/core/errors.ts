/**
 * Error handling for mergedesk
 * Provides structured errors that map onto HTTP responses
 */

/**
 * Error codes for different types of errors
 */
export enum ErrorCode {
  // Lookup errors
  NOT_FOUND = 'NOT_FOUND',
  ACCESS_DENIED = 'ACCESS_DENIED',
  UNAUTHENTICATED = 'UNAUTHENTICATED',

  // Input errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_STATE = 'INVALID_STATE',

  // Git errors
  BRANCH_NOT_FOUND = 'BRANCH_NOT_FOUND',
  MERGE_CONFLICT = 'MERGE_CONFLICT',
  GIT_COMMAND_FAILED = 'GIT_COMMAND_FAILED',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  [key: string]: unknown;
}

const HTTP_STATUS: Record<ErrorCode, 400 | 401 | 404 | 409 | 422 | 500> = {
  // Denials are reported as 404 so private resources are not disclosed
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ACCESS_DENIED]: 404,
  [ErrorCode.UNAUTHENTICATED]: 401,
  [ErrorCode.VALIDATION_FAILED]: 422,
  [ErrorCode.INVALID_STATE]: 409,
  [ErrorCode.BRANCH_NOT_FOUND]: 404,
  [ErrorCode.MERGE_CONFLICT]: 409,
  [ErrorCode.GIT_COMMAND_FAILED]: 500,
};

/**
 * Main error class for mergedesk
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  get status(): 400 | 401 | 404 | 409 | 422 | 500 {
    return HTTP_STATUS[this.code];
  }

  /**
   * Create error as JSON for API responses
   */
  toJSON(): { error: string; code: ErrorCode; context?: ErrorContext } {
    // Access denials never leak their context
    if (this.code === ErrorCode.ACCESS_DENIED) {
      return { error: 'Not found', code: ErrorCode.NOT_FOUND };
    }
    return {
      error: this.message,
      code: this.code,
      ...(Object.keys(this.context).length > 0 ? { context: this.context } : {}),
    };
  }
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  notFound(what: string, context: ErrorContext = {}): AppError {
    return new AppError(`${what} not found`, ErrorCode.NOT_FOUND, context);
  },

  accessDenied(action: string, context: ErrorContext = {}): AppError {
    return new AppError(`Not allowed to ${action}`, ErrorCode.ACCESS_DENIED, context);
  },

  unauthenticated(): AppError {
    return new AppError('Unauthorized', ErrorCode.UNAUTHENTICATED);
  },

  validation(messages: string[]): AppError {
    return new AppError(messages.join(', '), ErrorCode.VALIDATION_FAILED, { messages });
  },

  invalidState(message: string, context: ErrorContext = {}): AppError {
    return new AppError(message, ErrorCode.INVALID_STATE, context);
  },

  branchNotFound(branch: string, project: string): AppError {
    return new AppError(
      `Branch '${branch}' not found in ${project}`,
      ErrorCode.BRANCH_NOT_FOUND,
      { branch, project }
    );
  },

  mergeConflict(sourceBranch: string, targetBranch: string): AppError {
    return new AppError(
      `Merge of '${sourceBranch}' into '${targetBranch}' has conflicts`,
      ErrorCode.MERGE_CONFLICT,
      { sourceBranch, targetBranch }
    );
  },

  gitCommandFailed(args: string[], exitCode: number | null, stderr: string): AppError {
    return new AppError(
      `git ${args[0] ?? ''} failed${exitCode !== null ? ` with exit code ${exitCode}` : ''}: ${stderr.trim()}`,
      ErrorCode.GIT_COMMAND_FAILED,
      { args, exitCode }
    );
  },
};
