// src/reservation/domain/reservation.errors.ts

/**
 * 违反调用约定的错误（程序错误，不属于可恢复的业务结果）
 */

/**
 * 对不经过的起止站（或未开设的等级）计算票价
 */
export class InvalidRouteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRouteError';
  }
}

/**
 * 车次目录格式错误
 */
export class TrainCatalogFormatError extends Error {
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(line !== undefined ? `Line ${line}: ${message}` : message);
    this.name = 'TrainCatalogFormatError';
  }
}
