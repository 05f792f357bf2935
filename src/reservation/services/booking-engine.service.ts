// src/reservation/services/booking-engine.service.ts

/**
 * 订票引擎
 *
 * 订票流程（任一关卡失败即 Rejected）：
 *   Requested -> TatkalWindowChecked -> SeatsAssigned -> Priced -> Persisted -> Confirmed
 *
 * 并发控制：订票与退票按 (车次, 等级, 出行日期) 加锁，同一座位池上的操作串行执行，
 * 不同车次/等级/日期互不阻塞。查询类接口不加锁，可能读到略旧的余量。
 *
 * 出行日期在入口统一为 yyyy-MM-dd，同一天的不同写法共用一个座位池和一把锁。
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { KeyedMutex } from '../../common/utils/keyed-mutex.util';
import { Booking, BookingResult } from '../domain/booking';
import { Train } from '../domain/train';
import {
  BookedPassenger,
  BookingFailureKind,
  BookingRequest,
  ISODate,
  SeatAvailability,
  SortOrder,
  StationStop,
  TrainSortKey,
  TravelClass,
} from '../interfaces/reservation.interface';
import { loadReservationSettings, ReservationSettings } from '../reservation.config';
import type { Clock } from '../utils/clock';
import { RESERVATION_CLOCK } from '../utils/clock';
import { isWithinWindow, normalizeTravelDate, toMinutes, weekdayOf } from '../utils/time-of-day.util';
import { ReservationLedgerService } from './reservation-ledger.service';
import { TrainRegistryService } from './train-registry.service';

@Injectable()
export class BookingEngineService {
  private readonly logger = new Logger(BookingEngineService.name);
  private readonly settings: ReservationSettings;
  private readonly inventoryLocks = new KeyedMutex();

  constructor(
    private readonly registry: TrainRegistryService,
    private readonly ledger: ReservationLedgerService,
    private readonly configService: ConfigService,
    @Inject(RESERVATION_CLOCK) private readonly clock: Clock,
  ) {
    this.settings = loadReservationSettings(this.configService);
  }

  /**
   * 查询车次：经过起止站（方向正确）且当天开行
   *
   * 不检查余座，返回的车次仍可能订票失败
   */
  searchTrains(
    sourceCode: string,
    destinationCode: string,
    travelDate: ISODate,
    travelClass?: TravelClass,
  ): Train[] {
    const weekday = weekdayOf(this.toTravelDate(travelDate));
    return this.registry
      .all()
      .filter(train => train.serves(sourceCode, destinationCode) && train.runsOn(weekday))
      .filter(train => !travelClass || train.offersClass(travelClass));
  }

  /**
   * 订票
   */
  async bookTickets(request: BookingRequest): Promise<BookingResult> {
    const { trainId, userId, passengers, travelClass, sourceCode, destinationCode, isTatkal } = request;

    if (passengers.length === 0) {
      throw new RangeError('A booking needs at least one passenger');
    }

    const travelDate = normalizeTravelDate(request.travelDate, this.settings.timezone);
    if (!travelDate) {
      return this.reject('INVALID_TRAVEL_DATE', `Invalid travel date "${request.travelDate}"`);
    }

    // 1. 车次
    const train = this.registry.get(trainId);
    if (!train) {
      return this.reject('TRAIN_NOT_FOUND', `Train ${trainId} not found`);
    }

    // 2. 区间与等级
    if (!train.serves(sourceCode, destinationCode)) {
      return this.reject('INVALID_ROUTE', `Train ${trainId} does not run from ${sourceCode} to ${destinationCode}`);
    }
    if (!train.offersClass(travelClass)) {
      return this.reject('CLASS_NOT_OFFERED', `Train ${trainId} has no ${travelClass} class`);
    }

    // 3. Tatkal 时段：按下单时刻判断，而不是出行日期
    if (isTatkal && !this.isTatkalWindowOpen()) {
      const { start, end } = this.settings.tatkalWindow;
      return this.reject('TATKAL_WINDOW_VIOLATION', `Tatkal booking is only allowed between ${start} and ${end}`);
    }

    return this.inventoryLocks.runExclusive(this.inventoryKey(trainId, travelClass, travelDate), () => {
      // 4. 分配座位
      const seats = train.assignSeats(travelClass, passengers.length, travelDate);
      if (!seats) {
        return this.reject(
          'INSUFFICIENT_CAPACITY',
          `Not enough ${travelClass} seats on train ${trainId} for ${passengers.length} passengers`,
        );
      }

      // 5. 票价（Tatkal 加价后统一取整一次）
      const fare = train.getFare(
        travelClass,
        sourceCode,
        destinationCode,
        isTatkal ? this.settings.tatkalSurcharge : 1,
      );

      // 6. 按输入顺序为乘客分配座位
      const bookedPassengers: BookedPassenger[] = passengers.map((passenger, index) => ({
        ...passenger,
        seatNumber: seats[index],
      }));

      // 7. 生成订单并写入台账
      const booking = new Booking({
        id: randomUUID(),
        trainId,
        userId,
        passengers: bookedPassengers,
        travelClass,
        sourceCode,
        destinationCode,
        travelDate,
        fare,
        isTatkal,
        createdAt: this.clock.now().toISO() ?? new Date().toISOString(),
      });
      this.ledger.append(booking);

      this.logger.log(
        `Booking ${booking.id} confirmed: train ${trainId} ${travelClass} ${travelDate}, seats [${seats.join(', ')}]`,
      );
      const result: BookingResult = { ok: true, booking };
      return result;
    });
  }

  /**
   * 退票
   *
   * 不传 passengerNames 时整单退；否则按姓名退部分乘客（同名取第一位）。
   * 找到订单即返回 true，用户或订单不存在返回 false
   */
  async cancelBooking(userId: string, bookingId: string, passengerNames?: string[]): Promise<boolean> {
    if (!this.ledger.hasUser(userId)) {
      return false;
    }

    const located = this.ledger.find(userId, bookingId);
    if (!located) {
      return false;
    }

    const train = this.registry.get(located.trainId);
    const key = this.inventoryKey(located.trainId, located.travelClass, located.travelDate);

    return this.inventoryLocks.runExclusive(key, () => {
      // 排队期间订单可能已被其他请求退掉
      const booking = this.ledger.find(userId, bookingId);
      if (!booking) {
        return false;
      }

      let released: string[];
      if (!passengerNames || passengerNames.length === 0) {
        released = booking.assignedSeats;
        this.ledger.remove(userId, bookingId);
      } else {
        const partial = booking.withoutPassengers(passengerNames);
        released = partial.released;
        if (partial.booking.isEmpty) {
          this.ledger.remove(userId, bookingId);
        } else {
          this.ledger.replace(partial.booking);
        }
      }

      train?.releaseSeats(booking.travelClass, released, booking.travelDate);
      this.logger.log(`Booking ${bookingId} cancelled for user ${userId}, released seats [${released.join(', ')}]`);
      return true;
    });
  }

  getBookings(userId: string): Booking[] {
    return this.ledger.getBookings(userId);
  }

  /**
   * 车次时刻表，未知车次返回空列表
   */
  getTrainSchedule(trainId: string): StationStop[] {
    return this.registry.get(trainId)?.getStops() ?? [];
  }

  getSeatAvailability(trainId: string, travelDate: ISODate): SeatAvailability | undefined {
    const train = this.registry.get(trainId);
    if (!train) {
      return undefined;
    }
    const date = this.toTravelDate(travelDate);
    return { trainId, travelDate: date, classes: train.getAvailability(date) };
  }

  /**
   * 按始发站出发时刻排序（稳定排序，返回新数组）
   */
  sortTrainsByDepartureTime(trains: Train[], ascending = true): Train[] {
    return this.sortBy(trains, train => toMinutes(train.route.origin.departureTime), ascending);
  }

  /**
   * 按终到站到达时刻排序（稳定排序，返回新数组）
   */
  sortTrainsByArrivalTime(trains: Train[], ascending = true): Train[] {
    return this.sortBy(trains, train => toMinutes(train.route.terminus.arrivalTime), ascending);
  }

  sortTrains(trains: Train[], sortBy: TrainSortKey, order: SortOrder = 'asc'): Train[] {
    const ascending = order === 'asc';
    return sortBy === 'departure'
      ? this.sortTrainsByDepartureTime(trains, ascending)
      : this.sortTrainsByArrivalTime(trains, ascending);
  }

  /**
   * 当前时刻是否处于 Tatkal 时段
   */
  isTatkalWindowOpen(): boolean {
    const now = this.clock.now().setZone(this.settings.timezone);
    const { start, end } = this.settings.tatkalWindow;
    return isWithinWindow(now, start, end);
  }

  private sortBy(trains: Train[], keyOf: (train: Train) => number, ascending: boolean): Train[] {
    const direction = ascending ? 1 : -1;
    return [...trains].sort((a, b) => direction * (keyOf(a) - keyOf(b)));
  }

  private toTravelDate(value: string): ISODate {
    const date = normalizeTravelDate(value, this.settings.timezone);
    if (!date) {
      throw new RangeError(`Invalid date: "${value}"`);
    }
    return date;
  }

  private inventoryKey(trainId: string, travelClass: TravelClass, travelDate: ISODate): string {
    return `${trainId}:${travelClass}:${travelDate}`;
  }

  private reject(kind: BookingFailureKind, message: string): BookingResult {
    this.logger.warn(`Booking rejected (${kind}): ${message}`);
    return { ok: false, failure: { kind, message } };
  }
}
