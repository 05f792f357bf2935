// src/reservation/utils/time-of-day.util.ts

import { DateTime } from 'luxon';
import { ISODate, ISOTime, Weekday } from '../interfaces/reservation.interface';

/**
 * luxon weekday: 1 = 周一 ... 7 = 周日
 */
const WEEKDAYS: Weekday[] = ['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN'];

/**
 * 解析时刻（H:mm / HH:mm），统一为 HH:mm
 */
export function parseTimeOfDay(value: string): ISOTime {
  const parsed = DateTime.fromFormat(value.trim(), 'H:mm');
  if (!parsed.isValid) {
    throw new Error(`Invalid time of day: "${value}"`);
  }
  return parsed.toFormat('HH:mm');
}

/**
 * HH:mm -> 当日分钟数
 */
export function toMinutes(time: ISOTime): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * 解析星期缩写（MON..SUN，大小写不敏感）
 */
export function parseWeekday(value: string): Weekday {
  const normalized = value.trim().toUpperCase();
  const weekday = WEEKDAYS.find(day => day === normalized);
  if (!weekday) {
    throw new Error(`Invalid weekday: "${value}"`);
  }
  return weekday;
}

/**
 * 出行日期对应的星期
 */
export function weekdayOf(date: ISODate): Weekday {
  const parsed = DateTime.fromISO(date);
  if (!parsed.isValid) {
    throw new Error(`Invalid date: "${date}"`);
  }
  return WEEKDAYS[parsed.weekday - 1];
}

/**
 * 出行日期统一为 yyyy-MM-dd
 *
 * 不带时区的日期时间按运营时区解释；无法解析返回 null
 */
export function normalizeTravelDate(value: string, zone: string): ISODate | null {
  const parsed = DateTime.fromISO(value.trim(), { zone });
  return parsed.isValid ? parsed.toISODate() : null;
}

/**
 * 判断时刻是否落在 [start, end) 区间内
 */
export function isWithinWindow(now: DateTime, start: ISOTime, end: ISOTime): boolean {
  const minutes = now.hour * 60 + now.minute;
  return minutes >= toMinutes(start) && minutes < toMinutes(end);
}
