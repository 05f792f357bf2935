// src/reservation/utils/clock.ts

import { DateTime } from 'luxon';

/**
 * 时钟注入令牌（测试中替换为固定时钟）
 */
export const RESERVATION_CLOCK = 'RESERVATION_CLOCK';

export interface Clock {
  now(): DateTime;
}

export const systemClock: Clock = {
  now: () => DateTime.now(),
};

