// src/common/dto/standard-response.dto.ts

/**
 * 统一响应格式
 * 
 * 所有接口必须遵循此格式，确保前端处理一致性
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorResponse;
}

/**
 * 错误响应格式
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * 成功响应辅助函数
 */
export function successResponse<T>(data: T): StandardResponse<T> {
  return {
    success: true,
    data,
  };
}

/**
 * 错误响应辅助函数
 */
export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): StandardResponse<never> {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

/**
 * 取异常信息（catch 到的值不一定是 Error）
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 错误码常量
 */
export enum ErrorCode {
  // 资源未找到（车次、订单）
  NOT_FOUND = 'NOT_FOUND',

  // 车次不按此方向经过起止站
  INVALID_ROUTE = 'INVALID_ROUTE',

  // 车次未开设该等级
  CLASS_NOT_OFFERED = 'CLASS_NOT_OFFERED',

  // 出行日期无法解析
  INVALID_TRAVEL_DATE = 'INVALID_TRAVEL_DATE',

  // Tatkal 时段外下单
  TATKAL_WINDOW_VIOLATION = 'TATKAL_WINDOW_VIOLATION',

  // 余座不足
  INSUFFICIENT_CAPACITY = 'INSUFFICIENT_CAPACITY',
  
  // 内部服务器错误
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
