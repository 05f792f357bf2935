// src/reservation/dto/booking.dto.ts

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class PassengerDto {
  @ApiProperty({ description: '乘客姓名（部分退票按姓名匹配）', example: 'Asha Rao' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiPropertyOptional({ description: '年龄', example: 34 })
  @IsOptional()
  @IsInt()
  @Min(0)
  age?: number;
}

export class CreateBookingDto {
  @ApiProperty({ description: '车次号', example: '12951' })
  @IsString()
  @IsNotEmpty()
  trainId!: string;

  @ApiProperty({ description: '用户 ID', example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @ApiProperty({ description: '乘客列表（按顺序分配座位）', type: [PassengerDto] })
  @IsArray()
  @ArrayNotEmpty({ message: 'passengers 不能为空' })
  @ValidateNested({ each: true })
  @Type(() => PassengerDto)
  passengers!: PassengerDto[];

  @ApiProperty({ description: '车厢等级', example: 'SL' })
  @IsString()
  @IsNotEmpty()
  travelClass!: string;

  @ApiProperty({ description: '出发站代码', example: 'NDLS' })
  @IsString()
  @IsNotEmpty()
  sourceCode!: string;

  @ApiProperty({ description: '到达站代码', example: 'BCT' })
  @IsString()
  @IsNotEmpty()
  destinationCode!: string;

  @ApiProperty({ description: '出行日期（ISO 8601）', example: '2026-11-02', format: 'date' })
  @IsDateString({}, { message: 'travelDate 必须是有效的日期字符串 (ISO 8601)' })
  travelDate!: string;

  @ApiPropertyOptional({ description: '是否 Tatkal（仅 10:00-12:00 可订，票价上浮 30%）', default: false })
  @IsOptional()
  @IsBoolean()
  isTatkal?: boolean;
}

export class CancelBookingDto {
  @ApiProperty({ description: '用户 ID', example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @ApiPropertyOptional({
    description: '要退票的乘客姓名；为空时整单退票',
    type: [String],
    example: ['Asha Rao'],
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  passengerNames?: string[];
}
