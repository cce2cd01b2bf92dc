/**
 * Error codes, operator-facing messages and error classes for the ledger.
 *
 * Validation and not-found errors are raised before any state changes.
 * Persistence errors are raised when a durable write could not complete.
 */

export const LEDGER_ERROR_CODES = {
  // Validation
  INVALID_ID: 'InvalidID',
  DUPLICATE_ID: 'DuplicateID',
  EMPTY_NAME: 'EmptyName',
  INVALID_NAME: 'InvalidName',
  DUPLICATE_NAME: 'DuplicateName',
  INVALID_CATEGORY: 'InvalidCategory',
  NEGATIVE_QUANTITY: 'NegativeQuantity',
  NEGATIVE_PRICE: 'NegativePrice',
  INVALID_QUANTITY: 'InvalidQuantity',
  INVALID_PRICE: 'InvalidPrice',
  OUT_OF_STOCK: 'OutOfStock',
  INSUFFICIENT_QUANTITY: 'InsufficientQuantity',
  INVALID_THRESHOLD: 'InvalidThreshold',
  EMPTY_UPDATE: 'EmptyUpdate',

  // Lookup
  NOT_FOUND: 'NotFound',

  // Storage
  PERSISTENCE_FAILED: 'PersistenceFailed',
} as const;

export type LedgerErrorCode =
  (typeof LEDGER_ERROR_CODES)[keyof typeof LEDGER_ERROR_CODES];

export const LEDGER_ERROR_MESSAGES: Record<LedgerErrorCode, string> = {
  [LEDGER_ERROR_CODES.INVALID_ID]: 'Product ID must be a positive whole number',
  [LEDGER_ERROR_CODES.DUPLICATE_ID]: 'Product ID is already in use',
  [LEDGER_ERROR_CODES.EMPTY_NAME]: 'Item name cannot be empty',
  [LEDGER_ERROR_CODES.INVALID_NAME]: 'Item name must fit on a single line',
  [LEDGER_ERROR_CODES.DUPLICATE_NAME]: 'An item with this name already exists',
  [LEDGER_ERROR_CODES.INVALID_CATEGORY]: 'Category is not one of the allowed options',
  [LEDGER_ERROR_CODES.NEGATIVE_QUANTITY]: 'Quantity must be a non-negative whole number',
  [LEDGER_ERROR_CODES.NEGATIVE_PRICE]: 'Price cannot be negative',
  [LEDGER_ERROR_CODES.INVALID_QUANTITY]: 'Quantity to sell must be a positive whole number',
  [LEDGER_ERROR_CODES.INVALID_PRICE]: 'Unit price cannot be negative',
  [LEDGER_ERROR_CODES.OUT_OF_STOCK]: 'Item is out of stock',
  [LEDGER_ERROR_CODES.INSUFFICIENT_QUANTITY]: 'Not enough units in stock',
  [LEDGER_ERROR_CODES.INVALID_THRESHOLD]: 'Threshold must be a non-negative whole number',
  [LEDGER_ERROR_CODES.EMPTY_UPDATE]: 'No fields were given to update',
  [LEDGER_ERROR_CODES.NOT_FOUND]: 'Item not found',
  [LEDGER_ERROR_CODES.PERSISTENCE_FAILED]: 'Could not save data to disk',
};

export function isLedgerErrorCode(code: unknown): code is LedgerErrorCode {
  return (
    typeof code === 'string' &&
    Object.values(LEDGER_ERROR_CODES).some((known) => known === code)
  );
}

/** Message of an error from any realm, or the value as text. */
export function errorMessage(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: LedgerErrorCode,
    options?: {
      message?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    const userMessage = options?.message ?? LEDGER_ERROR_MESSAGES[code];
    super(userMessage, { cause: options?.cause });
    this.name = 'LedgerError';
    this.code = code;
    this.userMessage = userMessage;
    this.context = options?.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends LedgerError {
  constructor(
    code: LedgerErrorCode,
    options?: { message?: string; context?: Record<string, unknown> },
  ) {
    super(code, options);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends LedgerError {
  constructor(lookup: string, context?: Record<string, unknown>) {
    super(LEDGER_ERROR_CODES.NOT_FOUND, {
      message: `Item ${lookup} not found`,
      context,
    });
    this.name = 'NotFoundError';
  }
}

export class PersistenceError extends LedgerError {
  readonly path: string;

  constructor(path: string, operation: string, cause: unknown) {
    super(LEDGER_ERROR_CODES.PERSISTENCE_FAILED, {
      message: `Failed to ${operation} ${path}: ${errorMessage(cause)}`,
      context: { path, operation },
      cause,
    });
    this.name = 'PersistenceError';
    this.path = path;
  }
}
