// src/reservation/reservation.controller.ts

/**
 * Reservation Controller
 *
 * API 接口
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiExtraModels, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiErrorResponseDto } from '../common/dto/api-response.dto';
import {
  ErrorCode,
  errorMessage,
  errorResponse,
  successResponse,
} from '../common/dto/standard-response.dto';
import { BookingFailureKind } from './interfaces/reservation.interface';
import { BookingEngineService } from './services/booking-engine.service';
import { CancelBookingDto, CreateBookingDto } from './dto/booking.dto';
import { AvailabilityQueryDto, SearchTrainsQueryDto } from './dto/search-trains.dto';

const FAILURE_CODES: Record<BookingFailureKind, ErrorCode> = {
  TRAIN_NOT_FOUND: ErrorCode.NOT_FOUND,
  INVALID_ROUTE: ErrorCode.INVALID_ROUTE,
  CLASS_NOT_OFFERED: ErrorCode.CLASS_NOT_OFFERED,
  INVALID_TRAVEL_DATE: ErrorCode.INVALID_TRAVEL_DATE,
  TATKAL_WINDOW_VIOLATION: ErrorCode.TATKAL_WINDOW_VIOLATION,
  INSUFFICIENT_CAPACITY: ErrorCode.INSUFFICIENT_CAPACITY,
};

@ApiTags('reservations')
@ApiExtraModels(ApiErrorResponseDto)
@Controller('reservations')
export class ReservationController {
  private readonly logger = new Logger(ReservationController.name);

  constructor(private readonly bookingEngine: BookingEngineService) {}

  @Get('trains/search')
  @ApiOperation({
    summary: '查询车次',
    description: '按起止站（方向正确）与出行日期开行情况筛选车次，不检查余座',
  })
  @ApiResponse({ status: 200, description: '查询完成' })
  searchTrains(@Query() query: SearchTrainsQueryDto) {
    try {
      const trains = this.bookingEngine.searchTrains(
        query.source,
        query.destination,
        query.date,
        query.travelClass,
      );
      const sorted = query.sortBy
        ? this.bookingEngine.sortTrains(trains, query.sortBy, query.order)
        : trains;
      return successResponse(sorted.map(train => train.toSummary()));
    } catch (error) {
      this.logger.error('Failed to search trains:', error);
      return errorResponse(ErrorCode.INTERNAL_ERROR, errorMessage(error));
    }
  }

  @Get('trains/:trainId/schedule')
  @ApiOperation({ summary: '车次时刻表' })
  @ApiResponse({ status: 200, description: '途经站列表' })
  getTrainSchedule(@Param('trainId') trainId: string) {
    const stops = this.bookingEngine.getTrainSchedule(trainId);
    if (stops.length === 0) {
      return errorResponse(ErrorCode.NOT_FOUND, `Train ${trainId} not found`);
    }
    return successResponse(stops);
  }

  @Get('trains/:trainId/availability')
  @ApiOperation({ summary: '座位余量', description: '指定出行日期各等级的余座与定员' })
  @ApiResponse({ status: 200, description: '余量' })
  getSeatAvailability(@Param('trainId') trainId: string, @Query() query: AvailabilityQueryDto) {
    const availability = this.bookingEngine.getSeatAvailability(trainId, query.date);
    if (!availability) {
      return errorResponse(ErrorCode.NOT_FOUND, `Train ${trainId} not found`);
    }
    return successResponse(availability);
  }

  @Post('bookings')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '订票',
    description: '分配座位、计算票价并写入用户台账；Tatkal 仅限 10:00-12:00',
  })
  @ApiBody({ type: CreateBookingDto })
  @ApiResponse({ status: 200, description: '订票完成或被拒绝（见 error.code）' })
  async bookTickets(@Body() dto: CreateBookingDto) {
    try {
      const result = await this.bookingEngine.bookTickets({
        trainId: dto.trainId,
        userId: dto.userId,
        passengers: dto.passengers.map(passenger => ({ name: passenger.name, age: passenger.age })),
        travelClass: dto.travelClass,
        sourceCode: dto.sourceCode,
        destinationCode: dto.destinationCode,
        travelDate: dto.travelDate,
        isTatkal: dto.isTatkal ?? false,
      });
      if (!result.ok) {
        return errorResponse(FAILURE_CODES[result.failure.kind], result.failure.message);
      }
      return successResponse(result.booking.toJSON());
    } catch (error) {
      this.logger.error('Failed to book tickets:', error);
      return errorResponse(ErrorCode.INTERNAL_ERROR, errorMessage(error));
    }
  }

  @Post('bookings/:bookingId/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '退票',
    description: '不传 passengerNames 整单退票；否则按姓名退部分乘客',
  })
  @ApiBody({ type: CancelBookingDto })
  @ApiResponse({ status: 200, description: '退票完成' })
  async cancelBooking(@Param('bookingId') bookingId: string, @Body() dto: CancelBookingDto) {
    try {
      const cancelled = await this.bookingEngine.cancelBooking(dto.userId, bookingId, dto.passengerNames);
      if (!cancelled) {
        return errorResponse(ErrorCode.NOT_FOUND, `Booking ${bookingId} not found for user ${dto.userId}`);
      }
      return successResponse({ bookingId, cancelled });
    } catch (error) {
      this.logger.error('Failed to cancel booking:', error);
      return errorResponse(ErrorCode.INTERNAL_ERROR, errorMessage(error));
    }
  }

  @Get('users/:userId/bookings')
  @ApiOperation({ summary: '用户订单', description: '按下单顺序返回' })
  @ApiResponse({ status: 200, description: '订单列表' })
  getBookings(@Param('userId') userId: string) {
    return successResponse(this.bookingEngine.getBookings(userId).map(booking => booking.toJSON()));
  }
}
