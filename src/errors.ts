export type ValidationErrorCode = 'INSUFFICIENT_DATA' | 'UNSUPPORTED_FILTERING';

/**
 * 검증 치명 에러 기반 클래스
 * 해당 전략 검증만 중단 (배치는 계속), 재시도 없음
 */
export class ValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 요청한 윈도우/기간 구성에 비해 데이터가 부족 */
export class InsufficientDataError extends ValidationError {
  readonly required: number;
  readonly available: number;

  constructor(message: string, required: number, available: number) {
    super('INSUFFICIENT_DATA', message);
    this.required = required;
    this.available = available;
  }
}

/** 리포트를 하위 기간으로 제한할 수 없음 (strict 모드) */
export class UnsupportedFilteringError extends ValidationError {
  readonly reportType: string;

  constructor(message: string, reportType: string) {
    super('UNSUPPORTED_FILTERING', message);
    this.reportType = reportType;
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}
