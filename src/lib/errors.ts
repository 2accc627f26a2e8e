/**
 * CLI Errors
 * 每種錯誤對應一個結束碼
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: 1,
  REQUEST: 2,
  EMPTY_RESULT: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export abstract class EfaCliError extends Error {
  abstract readonly exitCode: ExitCode;
}

/**
 * 參數錯誤（在任何網路請求之前發現）
 */
export class UsageError extends EfaCliError {
  readonly exitCode = EXIT_CODES.USAGE;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * EFA 服務回報的請求錯誤
 */
export class RequestError extends EfaCliError {
  readonly exitCode = EXIT_CODES.REQUEST;

  constructor(readonly reason: string) {
    super(`Request error: ${reason}`);
    this.name = 'RequestError';
  }
}

/**
 * 沒有任何可顯示的資料
 */
export class EmptyResultError extends EfaCliError {
  readonly exitCode = EXIT_CODES.EMPTY_RESULT;

  constructor() {
    super('Nothing to show');
    this.name = 'EmptyResultError';
  }
}
