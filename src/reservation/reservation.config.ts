// src/reservation/reservation.config.ts

import { ConfigService } from '@nestjs/config';
import { ISOTime } from './interfaces/reservation.interface';
import { parseTimeOfDay } from './utils/time-of-day.util';

/**
 * Reservation 配置
 *
 * 环境变量（均可选）：
 * - TRAINS_CATALOG_PATH   车次目录文件，相对工作目录
 * - RESERVATION_TIMEZONE  Tatkal 时段判断所用时区
 * - TATKAL_WINDOW_START / TATKAL_WINDOW_END  Tatkal 时段 [start, end)
 * - TATKAL_SURCHARGE      Tatkal 票价倍率
 */
export interface ReservationSettings {
  catalogPath: string;
  timezone: string;
  tatkalWindow: { start: ISOTime; end: ISOTime };
  tatkalSurcharge: number;
}

export const DEFAULT_RESERVATION_SETTINGS: ReservationSettings = {
  catalogPath: 'data/trains.csv',
  timezone: 'Asia/Kolkata',
  tatkalWindow: { start: '10:00', end: '12:00' },
  tatkalSurcharge: 1.3,
};

export function loadReservationSettings(configService: ConfigService): ReservationSettings {
  const defaults = DEFAULT_RESERVATION_SETTINGS;
  const surcharge = Number(
    configService.get<string>('TATKAL_SURCHARGE', String(defaults.tatkalSurcharge)),
  );
  if (!Number.isFinite(surcharge) || surcharge < 1) {
    throw new Error(`TATKAL_SURCHARGE must be a number >= 1, got ${surcharge}`);
  }

  return {
    catalogPath: configService.get<string>('TRAINS_CATALOG_PATH', defaults.catalogPath),
    timezone: configService.get<string>('RESERVATION_TIMEZONE', defaults.timezone),
    tatkalWindow: {
      start: parseTimeOfDay(configService.get<string>('TATKAL_WINDOW_START', defaults.tatkalWindow.start)),
      end: parseTimeOfDay(configService.get<string>('TATKAL_WINDOW_END', defaults.tatkalWindow.end)),
    },
    tatkalSurcharge: surcharge,
  };
}
