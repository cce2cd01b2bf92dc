import { ClassConstructor, plainToInstance } from 'class-transformer';
import {
  ValidationError as ConstraintViolation,
  ValidationOptions,
  validateSync,
} from 'class-validator';
import {
  LEDGER_ERROR_MESSAGES,
  LedgerErrorCode,
  ValidationError,
  isLedgerErrorCode,
} from '../errors/ledger.errors';

/** Decorator options that tag a constraint with the ledger error it maps to. */
export function withCode(code: LedgerErrorCode): ValidationOptions {
  return { message: LEDGER_ERROR_MESSAGES[code], context: { code } };
}

export function trimString({ value }: { value: unknown }): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

function toLedgerError(violation: ConstraintViolation): ValidationError {
  const constraints = violation.constraints ?? {};
  const [constraint] = Object.keys(constraints);
  const code: unknown = violation.contexts?.[constraint]?.code;

  if (!isLedgerErrorCode(code)) {
    throw new Error(
      `Constraint "${constraint}" on ${violation.property} has no ledger error code`,
    );
  }

  return new ValidationError(code, {
    message: constraints[constraint],
    context: { field: violation.property, value: violation.value },
  });
}

/**
 * Builds the DTO from a plain request and rejects the first invalid field
 * with the ledger error code its constraint carries.
 */
export function validateRequest<T extends object>(
  dto: ClassConstructor<T>,
  request: object,
): T {
  const instance = plainToInstance(dto, request);
  const violations = validateSync(instance, { stopAtFirstError: true });

  if (violations.length > 0) {
    throw toLedgerError(violations[0]);
  }
  return instance;
}
