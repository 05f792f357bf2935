// src/reservation/services/reservation-ledger.service.ts

import { Injectable } from '@nestjs/common';
import { Booking } from '../domain/booking';

/**
 * 订单台账：userId -> 按下单顺序排列的订单
 *
 * 用户条目在首次下单时创建，之后不主动删除。
 * 订单对象不可变，对外返回的订单即快照
 */
@Injectable()
export class ReservationLedgerService {
  private readonly bookingsByUser = new Map<string, Booking[]>();

  hasUser(userId: string): boolean {
    return this.bookingsByUser.has(userId);
  }

  append(booking: Booking): void {
    const bookings = this.bookingsByUser.get(booking.userId);
    if (bookings) {
      bookings.push(booking);
    } else {
      this.bookingsByUser.set(booking.userId, [booking]);
    }
  }

  find(userId: string, bookingId: string): Booking | undefined {
    return this.bookingsByUser.get(userId)?.find(booking => booking.id === bookingId);
  }

  /**
   * 用新版本替换同 id 的订单（部分退票），顺序不变
   */
  replace(booking: Booking): boolean {
    const bookings = this.bookingsByUser.get(booking.userId);
    const index = bookings ? bookings.findIndex(existing => existing.id === booking.id) : -1;
    if (!bookings || index === -1) {
      return false;
    }
    bookings[index] = booking;
    return true;
  }

  remove(userId: string, bookingId: string): boolean {
    const bookings = this.bookingsByUser.get(userId);
    const index = bookings ? bookings.findIndex(booking => booking.id === bookingId) : -1;
    if (!bookings || index === -1) {
      return false;
    }
    bookings.splice(index, 1);
    return true;
  }

  getBookings(userId: string): Booking[] {
    return [...(this.bookingsByUser.get(userId) ?? [])];
  }

  /**
   * 所有仍有效的订单（用于座位守恒校验）
   */
  allBookings(): Booking[] {
    return [...this.bookingsByUser.values()].flat();
  }
}
