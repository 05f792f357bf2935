// src/reservation/services/booking-engine.service.spec.ts

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DateTime } from 'luxon';
import { Booking, BookingResult } from '../domain/booking';
import { BookingRequest, TrainDefinition } from '../interfaces/reservation.interface';
import { Clock, RESERVATION_CLOCK } from '../utils/clock';
import { BookingEngineService } from './booking-engine.service';
import { ReservationLedgerService } from './reservation-ledger.service';
import { TrainCatalogLoaderService } from './train-catalog-loader.service';
import { TrainRegistryService } from './train-registry.service';

const ZONE = 'Asia/Kolkata';
const TRAVEL_DATE = '2026-11-02'; // 周一

const T1: TrainDefinition = {
  id: 'T1',
  name: 'Test Express',
  classBaseFares: { SL: 500 },
  classCapacity: { SL: 5 },
  runningDays: ['MON', 'WED'],
  stops: [
    { code: 'AAA', name: 'Alpha', arrivalTime: '06:00', departureTime: '06:10', distanceFromOrigin: 0 },
    { code: 'BBB', name: 'Bravo', arrivalTime: '08:00', departureTime: '08:05', distanceFromOrigin: 120 },
    { code: 'CCC', name: 'Charlie', arrivalTime: '10:30', departureTime: '10:30', distanceFromOrigin: 200 },
  ],
};

const T2: TrainDefinition = {
  id: 'T2',
  name: 'Early Mail',
  classBaseFares: { SL: 400, '3A': 900 },
  classCapacity: { SL: 10, '3A': 4 },
  runningDays: ['MON'],
  stops: [
    { code: 'AAA', name: 'Alpha', arrivalTime: '04:30', departureTime: '04:40', distanceFromOrigin: 0 },
    { code: 'CCC', name: 'Charlie', arrivalTime: '11:15', departureTime: '11:15', distanceFromOrigin: 200 },
  ],
};

const T3: TrainDefinition = {
  id: 'T3',
  name: 'Weekend Special',
  classBaseFares: { SL: 450 },
  classCapacity: { SL: 8 },
  runningDays: ['SAT', 'SUN'],
  stops: [
    { code: 'AAA', name: 'Alpha', arrivalTime: '07:00', departureTime: '07:00', distanceFromOrigin: 0 },
    { code: 'CCC', name: 'Charlie', arrivalTime: '09:00', departureTime: '09:00', distanceFromOrigin: 200 },
  ],
};

function request(overrides: Partial<BookingRequest> = {}): BookingRequest {
  return {
    trainId: 'T1',
    userId: 'user-1',
    passengers: [{ name: 'Asha' }, { name: 'Ravi' }],
    travelClass: 'SL',
    sourceCode: 'AAA',
    destinationCode: 'CCC',
    travelDate: TRAVEL_DATE,
    isTatkal: false,
    ...overrides,
  };
}

function expectBooking(result: BookingResult): Booking {
  if (!result.ok) {
    throw new Error(`Expected a booking, got ${result.failure.kind}`);
  }
  return result.booking;
}

describe('BookingEngineService', () => {
  let service: BookingEngineService;
  let ledger: ReservationLedgerService;
  let now: DateTime;

  const clock: Clock = { now: () => now };

  const freeSeats = (trainId: string, travelClass: string, travelDate = TRAVEL_DATE) =>
    service.getSeatAvailability(trainId, travelDate)?.classes.find(c => c.travelClass === travelClass)?.free;

  beforeEach(async () => {
    now = DateTime.fromISO('2026-11-01T10:30:00', { zone: ZONE });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TrainCatalogLoaderService,
        TrainRegistryService,
        ReservationLedgerService,
        BookingEngineService,
        { provide: ConfigService, useValue: new ConfigService() },
        { provide: RESERVATION_CLOCK, useValue: clock },
      ],
    }).compile();

    const registry = module.get<TrainRegistryService>(TrainRegistryService);
    [T1, T2, T3].forEach(definition => registry.register(definition));

    service = module.get<BookingEngineService>(BookingEngineService);
    ledger = module.get<ReservationLedgerService>(ReservationLedgerService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('bookTickets', () => {
    it('should assign the two lowest seats and leave three free', async () => {
      const booking = expectBooking(await service.bookTickets(request()));

      expect(booking.assignedSeats).toEqual(['1', '2']);
      expect(booking.passengers).toEqual([
        { name: 'Asha', seatNumber: '1' },
        { name: 'Ravi', seatNumber: '2' },
      ]);
      expect(freeSeats('T1', 'SL')).toBe(3);
      expect(service.getBookings('user-1').map(b => b.id)).toEqual([booking.id]);
    });

    it('should reject a booking larger than the free pool and leave inventory unchanged', async () => {
      expectBooking(await service.bookTickets(request()));

      const result = await service.bookTickets(
        request({ passengers: [{ name: 'A' }, { name: 'B' }, { name: 'C' }, { name: 'D' }] }),
      );

      expect(result.ok).toBe(false);
      expect(!result.ok && result.failure.kind).toBe('INSUFFICIENT_CAPACITY');
      expect(freeSeats('T1', 'SL')).toBe(3);
      expect(service.getBookings('user-1')).toHaveLength(1);
    });

    it('should price base fare per 100 distance units', async () => {
      const booking = expectBooking(await service.bookTickets(request()));

      expect(booking.fare).toBe(1000);
      expect(booking.totalFare).toBe(2000);
      expect(booking.isTatkal).toBe(false);
    });

    it('should add the tatkal surcharge inside the window', async () => {
      const booking = expectBooking(await service.bookTickets(request({ isTatkal: true })));

      expect(booking.fare).toBe(1300);
      expect(booking.isTatkal).toBe(true);
    });

    it('should reject tatkal outside the window without consuming seats', async () => {
      now = DateTime.fromISO('2026-11-01T14:00:00', { zone: ZONE });

      const result = await service.bookTickets(request({ isTatkal: true }));

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'TATKAL_WINDOW_VIOLATION',
          message: 'Tatkal booking is only allowed between 10:00 and 12:00',
        },
      });
      expect(freeSeats('T1', 'SL')).toBe(5);
    });

    it('should treat 12:00 as outside the tatkal window', async () => {
      now = DateTime.fromISO('2026-11-01T12:00:00', { zone: ZONE });

      const result = await service.bookTickets(request({ isTatkal: true }));

      expect(!result.ok && result.failure.kind).toBe('TATKAL_WINDOW_VIOLATION');
    });

    it('should allow regular bookings at any time', async () => {
      now = DateTime.fromISO('2026-11-01T14:00:00', { zone: ZONE });

      expectBooking(await service.bookTickets(request()));
    });

    it('should reject an unknown train', async () => {
      const result = await service.bookTickets(request({ trainId: 'NOPE' }));

      expect(!result.ok && result.failure).toEqual({ kind: 'TRAIN_NOT_FOUND', message: 'Train NOPE not found' });
    });

    it('should reject a reversed route', async () => {
      const result = await service.bookTickets(request({ sourceCode: 'CCC', destinationCode: 'AAA' }));

      expect(!result.ok && result.failure.kind).toBe('INVALID_ROUTE');
    });

    it('should reject a class the train does not offer', async () => {
      const result = await service.bookTickets(request({ travelClass: '3A' }));

      expect(!result.ok && result.failure.kind).toBe('CLASS_NOT_OFFERED');
    });

    it('should throw for a booking without passengers', async () => {
      await expect(service.bookTickets(request({ passengers: [] }))).rejects.toThrow(RangeError);
    });

    it('should keep seat pools of different travel dates apart', async () => {
      expectBooking(await service.bookTickets(request()));
      const other = expectBooking(await service.bookTickets(request({ travelDate: '2026-11-04' })));

      expect(other.assignedSeats).toEqual(['1', '2']);
      expect(freeSeats('T1', 'SL', '2026-11-02')).toBe(3);
      expect(freeSeats('T1', 'SL', '2026-11-04')).toBe(3);
    });

    it('should share one seat pool between spellings of the same travel date', async () => {
      const fiveSeats = ['A', 'B', 'C', 'D', 'E'].map(name => ({ name }));
      const booking = expectBooking(await service.bookTickets(request({ passengers: fiveSeats })));

      const spelledWithTime = await service.bookTickets(
        request({ userId: 'user-2', passengers: fiveSeats, travelDate: '2026-11-02T00:00:00' }),
      );
      const spelledCompact = await service.bookTickets(
        request({ userId: 'user-3', passengers: fiveSeats, travelDate: '20261102' }),
      );

      expect(booking.travelDate).toBe('2026-11-02');
      expect(!spelledWithTime.ok && spelledWithTime.failure.kind).toBe('INSUFFICIENT_CAPACITY');
      expect(!spelledCompact.ok && spelledCompact.failure.kind).toBe('INSUFFICIENT_CAPACITY');
      expect(freeSeats('T1', 'SL', '20261102')).toBe(0);
    });

    it('should store the travel date in yyyy-MM-dd form', async () => {
      const booking = expectBooking(await service.bookTickets(request({ travelDate: '2026-11-02T08:00:00' })));

      expect(booking.travelDate).toBe('2026-11-02');
      expect(service.getSeatAvailability('T1', '2026-11-02T08:00:00')?.travelDate).toBe('2026-11-02');
    });

    it('should reject an unparseable travel date without creating a pool', async () => {
      const result = await service.bookTickets(request({ travelDate: 'garbage' }));

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'INVALID_TRAVEL_DATE', message: 'Invalid travel date "garbage"' },
      });
      expect(service.getBookings('user-1')).toEqual([]);
      expect(() => service.getSeatAvailability('T1', 'garbage')).toThrow('Invalid date: "garbage"');
    });

    it('should never hand out a seat twice under concurrent load', async () => {
      const attempts = Array.from({ length: 12 }, (_, i) =>
        service.bookTickets(request({ userId: `user-${i}`, passengers: [{ name: `P${i}` }] })),
      );

      const results = await Promise.all(attempts);
      const booked = results.filter(result => result.ok);
      const rejected = results.filter(result => !result.ok);
      const seats = results.flatMap(result => (result.ok ? result.booking.assignedSeats : []));

      expect(booked).toHaveLength(5);
      expect(rejected).toHaveLength(7);
      expect([...seats].sort()).toEqual(['1', '2', '3', '4', '5']);
      expect(new Set(seats).size).toBe(seats.length);
      expect(freeSeats('T1', 'SL')).toBe(0);
    });
  });

  describe('cancelBooking', () => {
    it('should release every seat on full cancellation', async () => {
      const booking = expectBooking(await service.bookTickets(request()));

      await expect(service.cancelBooking('user-1', booking.id)).resolves.toBe(true);

      expect(freeSeats('T1', 'SL')).toBe(5);
      expect(service.getBookings('user-1')).toEqual([]);
    });

    it('should release only the named passenger seat', async () => {
      const booking = expectBooking(
        await service.bookTickets(request({ passengers: [{ name: 'Asha' }, { name: 'Ravi' }, { name: 'Kiran' }] })),
      );

      await expect(service.cancelBooking('user-1', booking.id, ['Ravi'])).resolves.toBe(true);

      const [remaining] = service.getBookings('user-1');
      expect(remaining.passengers).toEqual([
        { name: 'Asha', seatNumber: '1' },
        { name: 'Kiran', seatNumber: '3' },
      ]);
      expect(remaining.assignedSeats).toEqual(['1', '3']);
      expect(freeSeats('T1', 'SL')).toBe(3);
    });

    it('should end in the same state whether cancelled one by one or at once', async () => {
      const first = expectBooking(await service.bookTickets(request()));
      await service.cancelBooking('user-1', first.id, ['Asha']);
      await service.cancelBooking('user-1', first.id, ['Ravi']);
      const oneByOne = { free: freeSeats('T1', 'SL'), bookings: service.getBookings('user-1').length };

      const second = expectBooking(await service.bookTickets(request()));
      await service.cancelBooking('user-1', second.id);
      const atOnce = { free: freeSeats('T1', 'SL'), bookings: service.getBookings('user-1').length };

      expect(oneByOne).toEqual({ free: 5, bookings: 0 });
      expect(atOnce).toEqual(oneByOne);
    });

    it('should return false for a user without bookings', async () => {
      await expect(service.cancelBooking('nobody', 'whatever')).resolves.toBe(false);
    });

    it('should return false for an unknown booking id', async () => {
      expectBooking(await service.bookTickets(request()));

      await expect(service.cancelBooking('user-1', 'missing')).resolves.toBe(false);
      expect(freeSeats('T1', 'SL')).toBe(3);
    });

    it('should not let another user cancel the booking', async () => {
      const booking = expectBooking(await service.bookTickets(request()));
      expectBooking(await service.bookTickets(request({ userId: 'user-2', passengers: [{ name: 'Meera' }] })));

      await expect(service.cancelBooking('user-2', booking.id)).resolves.toBe(false);
      expect(service.getBookings('user-1')).toHaveLength(1);
    });

    it('should return true when no listed name matches', async () => {
      const booking = expectBooking(await service.bookTickets(request()));

      await expect(service.cancelBooking('user-1', booking.id, ['Nobody'])).resolves.toBe(true);
      expect(service.getBookings('user-1')[0].assignedSeats).toEqual(['1', '2']);
      expect(freeSeats('T1', 'SL')).toBe(3);
    });

    it('should release seats once when the same booking is cancelled concurrently', async () => {
      const booking = expectBooking(await service.bookTickets(request()));

      const results = await Promise.all([
        service.cancelBooking('user-1', booking.id),
        service.cancelBooking('user-1', booking.id),
      ]);

      expect(results).toEqual([true, false]);
      expect(freeSeats('T1', 'SL')).toBe(5);
    });
  });

  it('should keep seats conserved when a caller edits a booking it was handed', async () => {
    expectBooking(await service.bookTickets(request({ userId: 'u' })));

    const [handed] = service.getBookings('u');
    handed.withoutPassengers(['Asha', 'Ravi']);

    const held = ledger.allBookings().flatMap(b => b.assignedSeats);
    expect(held).toEqual(['1', '2']);
    expect((freeSeats('T1', 'SL') ?? 0) + held.length).toBe(5);
  });

  it('should conserve seats across mixed bookings and cancellations', async () => {
    const a = expectBooking(await service.bookTickets(request({ userId: 'u1' })));
    expectBooking(await service.bookTickets(request({ userId: 'u2', passengers: [{ name: 'Meera' }] })));
    await service.cancelBooking('u1', a.id, ['Ravi']);
    expectBooking(await service.bookTickets(request({ userId: 'u3', passengers: [{ name: 'Arun' }, { name: 'Divya' }] })));

    const held = ledger
      .allBookings()
      .filter(b => b.trainId === 'T1' && b.travelClass === 'SL' && b.travelDate === TRAVEL_DATE)
      .flatMap(b => b.assignedSeats);

    expect(new Set(held).size).toBe(held.length);
    expect((freeSeats('T1', 'SL') ?? 0) + held.length).toBe(5);
  });

  describe('searchTrains', () => {
    it('should return trains serving the pair on the travel weekday', () => {
      const trains = service.searchTrains('AAA', 'CCC', TRAVEL_DATE);

      expect(trains.map(t => t.id)).toEqual(['T1', 'T2']);
    });

    it('should use the weekday of the travel date', () => {
      expect(service.searchTrains('AAA', 'CCC', '2026-11-07').map(t => t.id)).toEqual(['T3']);
    });

    it('should not return trains for the reverse direction', () => {
      expect(service.searchTrains('CCC', 'AAA', TRAVEL_DATE)).toEqual([]);
    });

    it('should filter by offered class when given', () => {
      expect(service.searchTrains('AAA', 'CCC', TRAVEL_DATE, '3A').map(t => t.id)).toEqual(['T2']);
    });

    it('should still list a train whose pool is exhausted', async () => {
      expectBooking(
        await service.bookTickets(
          request({ passengers: ['A', 'B', 'C', 'D', 'E'].map(name => ({ name })) }),
        ),
      );

      expect(service.searchTrains('AAA', 'BBB', TRAVEL_DATE).map(t => t.id)).toEqual(['T1']);
    });
  });

  describe('sorting', () => {
    it('should sort by first departure', () => {
      const trains = service.searchTrains('AAA', 'CCC', TRAVEL_DATE);

      expect(service.sortTrainsByDepartureTime(trains, true).map(t => t.id)).toEqual(['T2', 'T1']);
      expect(service.sortTrainsByDepartureTime(trains, false).map(t => t.id)).toEqual(['T1', 'T2']);
    });

    it('should sort by last arrival', () => {
      const trains = service.searchTrains('AAA', 'CCC', TRAVEL_DATE);

      expect(service.sortTrainsByArrivalTime(trains, true).map(t => t.id)).toEqual(['T1', 'T2']);
      expect(service.sortTrains(trains, 'arrival', 'desc').map(t => t.id)).toEqual(['T2', 'T1']);
    });

    it('should not reorder the input list', () => {
      const trains = service.searchTrains('AAA', 'CCC', TRAVEL_DATE);

      service.sortTrainsByDepartureTime(trains);

      expect(trains.map(t => t.id)).toEqual(['T1', 'T2']);
    });
  });

  describe('getTrainSchedule', () => {
    it('should return the stops in route order', () => {
      expect(service.getTrainSchedule('T1').map(stop => stop.code)).toEqual(['AAA', 'BBB', 'CCC']);
    });

    it('should return an empty list for an unknown train', () => {
      expect(service.getTrainSchedule('NOPE')).toEqual([]);
    });
  });

  describe('getSeatAvailability', () => {
    it('should report full capacity before any booking', () => {
      expect(service.getSeatAvailability('T2', TRAVEL_DATE)).toEqual({
        trainId: 'T2',
        travelDate: TRAVEL_DATE,
        classes: [
          { travelClass: 'SL', capacity: 10, free: 10 },
          { travelClass: '3A', capacity: 4, free: 4 },
        ],
      });
    });

    it('should return undefined for an unknown train', () => {
      expect(service.getSeatAvailability('NOPE', TRAVEL_DATE)).toBeUndefined();
    });
  });
});
