// src/common/dto/api-response.dto.ts

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ErrorCode } from './standard-response.dto';

/**
 * 错误信息 DTO（用于 Swagger 文档）
 */
export class ApiErrorDto {
  @ApiProperty({
    enum: ErrorCode,
    example: ErrorCode.INSUFFICIENT_CAPACITY,
  })
  code!: string;

  @ApiProperty({ example: 'Not enough SL seats on train 12951 for 4 passengers' })
  message!: string;

  @ApiPropertyOptional({ type: Object, example: { trainId: '12951' } })
  details?: Record<string, unknown>;
}

/**
 * 错误响应 DTO（用于 Swagger 文档）
 */
export class ApiErrorResponseDto {
  @ApiProperty({ enum: [false], example: false })
  success!: false;

  @ApiProperty({ type: ApiErrorDto })
  error!: ApiErrorDto;
}
