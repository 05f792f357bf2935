// src/reservation/dto/search-trains.dto.ts

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import type { SortOrder, TrainSortKey } from '../interfaces/reservation.interface';

export class SearchTrainsQueryDto {
  @ApiProperty({ description: '出发站代码', example: 'NDLS' })
  @IsString()
  @IsNotEmpty()
  source!: string;

  @ApiProperty({ description: '到达站代码', example: 'BCT' })
  @IsString()
  @IsNotEmpty()
  destination!: string;

  @ApiProperty({ description: '出行日期（ISO 8601）', example: '2026-11-02', format: 'date' })
  @IsDateString({}, { message: 'date 必须是有效的日期字符串 (ISO 8601)' })
  date!: string;

  @ApiPropertyOptional({ description: '只返回开设该等级的车次', example: 'SL' })
  @IsOptional()
  @IsString()
  travelClass?: string;

  @ApiPropertyOptional({ enum: ['departure', 'arrival'], description: '排序依据' })
  @IsOptional()
  @IsIn(['departure', 'arrival'])
  sortBy?: TrainSortKey;

  @ApiPropertyOptional({ enum: ['asc', 'desc'], default: 'asc' })
  @IsOptional()
  @IsIn(['asc', 'desc'])
  order?: SortOrder;
}

export class AvailabilityQueryDto {
  @ApiProperty({ description: '出行日期（ISO 8601）', example: '2026-11-02', format: 'date' })
  @IsDateString({}, { message: 'date 必须是有效的日期字符串 (ISO 8601)' })
  date!: string;
}
