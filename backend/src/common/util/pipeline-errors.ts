import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from './route-errors';
import type { BatchStatus, RowIssue } from '@src/types/pipeline';


/******************************************************************************
                           Upload / mapping errors
******************************************************************************/

/**
 * The upload itself is malformed (no rows, header/sample column mismatch,
 * unsupported file). Raised before any record is processed or paid for.
 */
export class SchemaError extends RouteError {
  public constructor(message: string) {
    super(HttpStatusCodes.UNPROCESSABLE_ENTITY, message);
  }
}

/**
 * A column assignment would break a field's cardinality limit.
 */
export class FieldConflictError extends RouteError {
  public readonly field: string;
  public readonly columnIndex?: number;

  public constructor(field: string, message: string, columnIndex?: number) {
    super(HttpStatusCodes.CONFLICT, message);
    this.field = field;
    this.columnIndex = columnIndex;
  }
}

/**
 * One row/field violation. `row` counts data rows from 1 (the header row is
 * not counted); `column` is the 1-based position in the source file.
 */
export class ValidationError extends RouteError {
  public readonly row: number;
  public readonly field: string;
  public readonly column?: number;
  public readonly detail: string;

  public constructor(issue: { row: number; field: string; column?: number; detail: string }) {
    const where = issue.column !== undefined ? `row ${issue.row}, column ${issue.column}` : `row ${issue.row}`;
    super(HttpStatusCodes.UNPROCESSABLE_ENTITY, `Invalid ${issue.field} at ${where}: ${issue.detail}`);
    this.row = issue.row;
    this.field = issue.field;
    this.column = issue.column;
    this.detail = issue.detail;
  }

  public toIssue(): RowIssue {
    return {
      row: this.row,
      column: this.column,
      field: this.field,
      message: this.message,
    };
  }
}


/******************************************************************************
                              Pipeline errors
******************************************************************************/

export type ExternalFailureKind = 'timeout' | 'rate_limited' | 'service_error';

/**
 * Transient failure talking to the skip-trace provider.
 */
export class ExternalServiceError extends RouteError {
  public readonly kind: ExternalFailureKind;

  public constructor(kind: ExternalFailureKind, message: string) {
    super(HttpStatusCodes.SERVICE_UNAVAILABLE, message);
    this.kind = kind;
  }
}

export class BatchStateError extends RouteError {
  public readonly batchStatus: BatchStatus;

  public constructor(batchStatus: BatchStatus, message: string) {
    super(HttpStatusCodes.CONFLICT, message);
    this.batchStatus = batchStatus;
  }
}
