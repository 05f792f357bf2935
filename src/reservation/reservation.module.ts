// src/reservation/reservation.module.ts

/**
 * Reservation Module
 */

import { Module } from '@nestjs/common';
import { ReservationController } from './reservation.controller';
import { BookingEngineService } from './services/booking-engine.service';
import { ReservationLedgerService } from './services/reservation-ledger.service';
import { TrainCatalogLoaderService } from './services/train-catalog-loader.service';
import { TrainRegistryService } from './services/train-registry.service';
import { RESERVATION_CLOCK, systemClock } from './utils/clock';

@Module({
  controllers: [ReservationController],
  providers: [
    TrainCatalogLoaderService,
    TrainRegistryService,
    ReservationLedgerService,
    BookingEngineService,
    { provide: RESERVATION_CLOCK, useValue: systemClock },
  ],
  exports: [BookingEngineService, TrainRegistryService, ReservationLedgerService],
})
export class ReservationModule {}
