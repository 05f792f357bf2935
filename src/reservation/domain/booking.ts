// src/reservation/domain/booking.ts

import {
  BookedPassenger,
  BookingFailure,
  ISODate,
  TravelClass,
} from '../interfaces/reservation.interface';
import { roundFare } from './train';

export interface BookingProps {
  id: string;
  trainId: string;
  userId: string;
  passengers: BookedPassenger[];
  travelClass: TravelClass;
  sourceCode: string;
  destinationCode: string;
  travelDate: ISODate;
  fare: number;
  isTatkal: boolean;
  createdAt: string;
}

/**
 * 已确认的订单
 *
 * 不可变：部分退票生成新的订单替换台账中的旧订单，
 * 持有旧订单对象的调用方无法改动台账或座位池
 */
export class Booking {
  readonly id: string;
  readonly trainId: string;
  readonly userId: string;
  readonly travelClass: TravelClass;
  readonly sourceCode: string;
  readonly destinationCode: string;
  readonly travelDate: ISODate;
  /** 单张票价（含 Tatkal 加价） */
  readonly fare: number;
  readonly isTatkal: boolean;
  readonly createdAt: string;

  private readonly passengerList: readonly BookedPassenger[];

  constructor(props: BookingProps) {
    this.id = props.id;
    this.trainId = props.trainId;
    this.userId = props.userId;
    this.travelClass = props.travelClass;
    this.sourceCode = props.sourceCode;
    this.destinationCode = props.destinationCode;
    this.travelDate = props.travelDate;
    this.fare = props.fare;
    this.isTatkal = props.isTatkal;
    this.createdAt = props.createdAt;
    this.passengerList = props.passengers.map(passenger => ({ ...passenger }));
  }

  get passengers(): BookedPassenger[] {
    return this.passengerList.map(passenger => ({ ...passenger }));
  }

  /**
   * 与 passengers 一一对应
   */
  get assignedSeats(): string[] {
    return this.passengerList.map(passenger => passenger.seatNumber);
  }

  get totalFare(): number {
    return roundFare(this.fare * this.passengerList.length);
  }

  get isEmpty(): boolean {
    return this.passengerList.length === 0;
  }

  /**
   * 按姓名移除乘客，返回剩余乘客组成的新订单与被释放的座位
   *
   * 每个姓名只匹配第一位仍在订单中的同名乘客；找不到的姓名忽略。当前订单不变
   */
  withoutPassengers(names: string[]): { booking: Booking; released: string[] } {
    const remaining = this.passengers;
    const released: string[] = [];
    for (const name of names) {
      const index = remaining.findIndex(passenger => passenger.name === name);
      if (index === -1) {
        continue;
      }
      const [removed] = remaining.splice(index, 1);
      released.push(removed.seatNumber);
    }
    return { booking: new Booking({ ...this.toProps(), passengers: remaining }), released };
  }

  private toProps(): BookingProps {
    return {
      id: this.id,
      trainId: this.trainId,
      userId: this.userId,
      passengers: this.passengers,
      travelClass: this.travelClass,
      sourceCode: this.sourceCode,
      destinationCode: this.destinationCode,
      travelDate: this.travelDate,
      fare: this.fare,
      isTatkal: this.isTatkal,
      createdAt: this.createdAt,
    };
  }

  toJSON() {
    return {
      id: this.id,
      trainId: this.trainId,
      userId: this.userId,
      passengers: this.passengers,
      travelClass: this.travelClass,
      sourceCode: this.sourceCode,
      destinationCode: this.destinationCode,
      travelDate: this.travelDate,
      assignedSeats: this.assignedSeats,
      fare: this.fare,
      totalFare: this.totalFare,
      isTatkal: this.isTatkal,
      createdAt: this.createdAt,
    };
  }
}

/**
 * 订票结果
 */
export type BookingResult =
  | { ok: true; booking: Booking }
  | { ok: false; failure: BookingFailure };
