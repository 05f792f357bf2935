// scripts/simulate-bookings.ts

/**
 * 并发订票模拟
 *
 * 启动应用上下文（加载车次目录），让多个模拟用户同时查询、订票、退票，
 * 最后打印各用户台账与座位余量。
 *
 * 用法：npm run simulate
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { BookingEngineService } from '../src/reservation/services/booking-engine.service';

interface Journey {
  source: string;
  destination: string;
  travelClass: string;
  passengers: string[];
  cancelOne: boolean;
}

// 与目录中的线路对应：德里-孟买、班加罗尔-特里凡得琅、普里-德里
const JOURNEYS: Journey[] = [
  { source: 'NDLS', destination: 'BCT', travelClass: '3A', passengers: ['Asha', 'Ravi'], cancelOne: false },
  { source: 'SBC', destination: 'TVC', travelClass: 'SL', passengers: ['Meera', 'Arun', 'Kiran'], cancelOne: true },
  { source: 'PURI', destination: 'NDLS', travelClass: '2A', passengers: ['Divya'], cancelOne: false },
];

const TRAVEL_DATE = '2026-11-07'; // 周六

async function simulateUser(engine: BookingEngineService, userId: string, journey: Journey) {
  const trains = engine.sortTrainsByDepartureTime(
    engine.searchTrains(journey.source, journey.destination, TRAVEL_DATE, journey.travelClass),
  );
  if (trains.length === 0) {
    console.log(`⚠️  [${userId}] 没有 ${journey.source} -> ${journey.destination} 的车次`);
    return;
  }

  const train = trains[0];
  const result = await engine.bookTickets({
    trainId: train.id,
    userId,
    passengers: journey.passengers.map(name => ({ name: `${name} (${userId})` })),
    travelClass: journey.travelClass,
    sourceCode: journey.source,
    destinationCode: journey.destination,
    travelDate: TRAVEL_DATE,
    isTatkal: false,
  });

  if (!result.ok) {
    console.log(`❌ [${userId}] 订票失败: ${result.failure.kind} - ${result.failure.message}`);
    return;
  }

  const { booking } = result;
  console.log(`✅ [${userId}] ${train.name} 座位 ${booking.assignedSeats.join(', ')}，票价 ${booking.totalFare}`);

  if (journey.cancelOne) {
    const [first] = booking.passengers;
    await engine.cancelBooking(userId, booking.id, [first.name]);
    console.log(`↩️  [${userId}] 已退 ${first.name}（座位 ${first.seatNumber}）`);
  }
}

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  const engine = app.get(BookingEngineService);

  const users = ['USER1', 'USER2', 'USER3', 'USER4', 'USER5', 'USER6'];
  await Promise.all(users.map((userId, index) => simulateUser(engine, userId, JOURNEYS[index % JOURNEYS.length])));

  console.log('\n📒 台账:');
  for (const userId of users) {
    for (const booking of engine.getBookings(userId)) {
      console.log(`  ${userId}: ${booking.trainId} ${booking.travelClass} [${booking.assignedSeats.join(', ')}]`);
    }
  }

  console.log('\n💺 余量:');
  for (const trainId of ['12951', '16525', '12801']) {
    const availability = engine.getSeatAvailability(trainId, TRAVEL_DATE);
    const summary = availability?.classes.map(c => `${c.travelClass} ${c.free}/${c.capacity}`).join('  ');
    console.log(`  ${trainId}: ${summary ?? '未知车次'}`);
  }

  await app.close();
}

main().catch(error => {
  console.error('❌ 模拟失败:', error);
  process.exit(1);
});
