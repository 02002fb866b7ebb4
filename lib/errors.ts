/**
 * Structured errors for the catalog view layer.
 *
 * Missing optional data never raises; these cover the cases where a page
 * cannot be rendered at all.
 */

export type CatalogViewErrorCode =
  | 'UNKNOWN_SERIES'    // Table code outside m/g/t/c/e
  | 'RECORD_NOT_FOUND'  // doc_id absent or not positive
  | 'INVALID_RECORD'    // Record dictionary failed its schema
  | 'PAGE_NOT_FOUND'    // API page or start index out of range
  | 'INVALID_PAGING'    // pageSize, start or page not a positive integer
  | 'INVALID_ORIGIN'    // API origin not an absolute http(s) URL
  | 'INVALID_CONFIG';   // Environment configuration rejected

export interface CatalogViewError {
  code: CatalogViewErrorCode;
  message: string;
  context?: string;
  details?: Record<string, unknown>;
}

export class CatalogViewException extends Error {
  public readonly error: CatalogViewError;

  constructor(error: CatalogViewError) {
    super(error.message);
    this.name = 'CatalogViewException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogViewException);
    }
  }

  get code(): CatalogViewErrorCode {
    return this.error.code;
  }

  toJSON(): CatalogViewError {
    return this.error;
  }
}

export function isCatalogViewException(value: unknown): value is CatalogViewException {
  return value instanceof CatalogViewException;
}

export function createUnknownSeriesError(code: string): CatalogViewException {
  return new CatalogViewException({
    code: 'UNKNOWN_SERIES',
    message: `Unknown record series "${code}"`,
    context: code,
  });
}

export function createRecordNotFoundError(series: string, docId: number): CatalogViewException {
  return new CatalogViewException({
    code: 'RECORD_NOT_FOUND',
    message: `No ${series} record with number ${docId}`,
    context: `${series}${docId}`,
  });
}

export function createInvalidRecordError(
  mscid: string,
  issues: Array<{ path: Array<string | number>; message: string }>
): CatalogViewException {
  const first = issues[0];
  const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
  return new CatalogViewException({
    code: 'INVALID_RECORD',
    message: `Record ${mscid} is malformed${where}: ${first?.message ?? 'unknown problem'}`,
    context: mscid,
    details: { issues },
  });
}

export function createPageNotFoundError(
  parameter: 'start' | 'page',
  value: number,
  limit: number
): CatalogViewException {
  return new CatalogViewException({
    code: 'PAGE_NOT_FOUND',
    message: `${parameter}=${value} is outside the range 1-${limit}`,
    details: { parameter, value, limit },
  });
}

export function createInvalidPagingError(
  parameter: 'pageSize' | 'start' | 'page',
  value: number
): CatalogViewException {
  return new CatalogViewException({
    code: 'INVALID_PAGING',
    message: `${parameter}=${value} is not a positive integer`,
    details: { parameter, value },
  });
}

export function createInvalidOriginError(origin: string): CatalogViewException {
  return new CatalogViewException({
    code: 'INVALID_ORIGIN',
    message: `API origin "${origin}" is not an absolute http(s) URL`,
    context: origin,
  });
}

export function createInvalidConfigError(
  issues: Array<{ path: Array<string | number>; message: string }>
): CatalogViewException {
  return new CatalogViewException({
    code: 'INVALID_CONFIG',
    message: `Invalid configuration: ${issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')}`,
    details: { issues },
  });
}
