/**
 * Error Handler for EAVS warehouse scripts
 * Classifies warehouse/storage errors and provides retry logic for transient failures
 */

/** Missing or invalid configuration. Fatal before any external call is made. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A single year's mapping cannot be turned into a SELECT block. */
export class MappingError extends Error {
  constructor(
    message: string,
    readonly mappingKey: string,
    readonly year: string
  ) {
    super(message);
    this.name = 'MappingError';
  }
}

/** View SQL that is not in the CTE union format the patcher reads and writes. */
export class UnsupportedViewSqlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedViewSqlError';
  }
}

export type ErrorCategory =
  | 'connection'
  | 'timeout'
  | 'deadlock'
  | 'constraint'
  | 'syntax'
  | 'auth'
  | 'not_found'
  | 'unknown';

export interface ErrorClassification {
  isTransient: boolean;
  category: ErrorCategory;
  message: string;
  suggestion: string;
}

function readField(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  return Reflect.get(error, key);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  const message = readField(error, 'message');
  return typeof message === 'string' ? message : String(error);
}

/**
 * Classify an error to determine if it's transient
 *
 * Understands mssql errors (`code`, `number`) and Azure storage REST errors
 * (`statusCode`, `code`).
 */
export function classifyError(error: unknown): ErrorClassification {
  const message = errorMessage(error);
  const code = readField(error, 'code');
  const number = readField(error, 'number');
  const statusCode = readField(error, 'statusCode');

  if (
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up')
  ) {
    return {
      isTransient: true,
      category: 'connection',
      message: 'Connection error',
      suggestion: 'Retrying with exponential backoff'
    };
  }

  if (
    number === -2 ||
    code === 'ETIMEOUT' ||
    statusCode === 408 ||
    statusCode === 503 ||
    /timeout/i.test(message)
  ) {
    return {
      isTransient: true,
      category: 'timeout',
      message: 'Request timeout',
      suggestion: 'Consider increasing requestTimeout or retrying later'
    };
  }

  if (number === 1205 || message.includes('deadlock')) {
    return {
      isTransient: true,
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Retrying statement'
    };
  }

  if (
    number === 18456 ||
    code === 'ELOGIN' ||
    statusCode === 401 ||
    statusCode === 403 ||
    code === 'AuthenticationFailed' ||
    code === 'AuthorizationFailure'
  ) {
    return {
      isTransient: false,
      category: 'auth',
      message: 'Authentication or authorization failure',
      suggestion: 'Check SQLSERVER credentials and the SAS token in BLOB_CONTAINER_URL'
    };
  }

  if (
    statusCode === 404 ||
    code === 'ContainerNotFound' ||
    code === 'BlobNotFound' ||
    code === 'ENOENT'
  ) {
    return {
      isTransient: false,
      category: 'not_found',
      message: 'Resource not found',
      suggestion: 'Verify the container, blob path or local file exists'
    };
  }

  if (
    number === 547 ||
    number === 2627 ||
    number === 2601 ||
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE constraint')
  ) {
    return {
      isTransient: false,
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check data integrity and fix source data'
    };
  }

  if (
    number === 102 ||
    number === 156 ||
    number === 207 ||
    number === 208 ||
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name') ||
    message.includes('Invalid column name')
  ) {
    return {
      isTransient: false,
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Check the field mappings and the generated SQL'
    };
  }

  return {
    isTransient: false,
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs'
  };
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number; // milliseconds
  maxDelay?: number; // milliseconds
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Retry a function with exponential backoff
 * Only transient errors are retried; everything else is rethrown at once.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelay = 1000, maxDelay = 30000, onRetry } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const classification = classifyError(error);
      if (!classification.isTransient || attempt === maxRetries) {
        throw error;
      }

      const exponentialDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delay = exponentialDelay + jitter;

      if (onRetry) {
        onRetry(attempt, error);
      }

      console.log(`  ⚠️  ${classification.message} (attempt ${attempt}/${maxRetries})`);
      console.log(`     ${classification.suggestion}`);
      console.log(`     Retrying in ${(delay / 1000).toFixed(1)}s...`);

      await sleep(delay);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Transient:   ${classification.isTransient ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  const code = readField(error, 'code');
  if (code !== undefined) {
    formatted += `  Error Code:  ${String(code)}\n`;
  }

  const number = readField(error, 'number');
  if (number !== undefined) {
    formatted += `  SQL Number:  ${String(number)}\n`;
  }

  const lineNumber = readField(error, 'lineNumber');
  if (lineNumber !== undefined) {
    formatted += `  Line:        ${String(lineNumber)}\n`;
  }

  const stack = readField(error, 'stack');
  if (typeof stack === 'string') {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}
