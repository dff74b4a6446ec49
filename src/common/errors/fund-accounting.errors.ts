import { HttpException, HttpStatus } from '@nestjs/common';

export type ErrorDetails = Record<string, string | number | string[]>;

// Base for every data-quality failure raised by NAV and unitisation.
// The whole batch aborts; details carry what an operator needs to fix the source.
export abstract class FundAccountingError extends HttpException {
  readonly details: ErrorDetails;

  protected constructor(message: string, details: ErrorDetails, status: HttpStatus) {
    super({ statusCode: status, error: new.target.name, message, details }, status);
    this.details = details;
  }
}

/** Required fields missing or unreadable */
export class SchemaError extends FundAccountingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details, HttpStatus.BAD_REQUEST);
  }
}

export class InvalidKindError extends FundAccountingError {
  constructor(index: number, kind: string) {
    super(
      `Transaction kind must be 'Subscription' or 'Redemption', got '${kind}' at index ${index}`,
      { index, kind },
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class MissingQuoteError extends FundAccountingError {
  constructor(date: string) {
    super(`NAV per unit missing for date ${date}`, { date }, HttpStatus.BAD_REQUEST);
  }
}

export class InvalidQuoteError extends FundAccountingError {
  constructor(date: string, navPerUnit: string) {
    super(
      `NAV per unit must be > 0 for date ${date}, got ${navPerUnit}`,
      { date, navPerUnit },
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class InsufficientBalanceError extends FundAccountingError {
  constructor(investor: string, date: string, heldUnits: string, requestedUnits: string) {
    super(
      `Redemption exceeds available units for ${investor} on ${date}. Has ${heldUnits}, trying to redeem ${requestedUnits}`,
      { investor, date, heldUnits, requestedUnits },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/** Caller-supplied scalar out of range */
export class ArgumentError extends FundAccountingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details, HttpStatus.BAD_REQUEST);
  }
}
