// src/reservation/domain/train.ts

/**
 * 车次
 *
 * 线路、票价、开行日在加载后不变；座位池是唯一的可变状态，
 * 按 (等级, 出行日期) 懒创建
 */

import {
  ClassAvailability,
  ISODate,
  StationStop,
  TrainDefinition,
  TrainSummary,
  TravelClass,
  Weekday,
} from '../interfaces/reservation.interface';
import { InvalidRouteError } from './reservation.errors';
import { Route } from './route';
import { SeatInventory } from './seat-inventory';

/**
 * 票价按每 100 里程计
 */
const FARE_DISTANCE_UNIT = 100;

export function roundFare(value: number): number {
  return Math.round(value * 100) / 100;
}

export class Train {
  readonly id: string;
  readonly name: string;
  readonly route: Route;

  private readonly classBaseFares: ReadonlyMap<TravelClass, number>;
  private readonly classCapacity: ReadonlyMap<TravelClass, number>;
  private readonly runningDays: ReadonlySet<Weekday>;
  private readonly inventories = new Map<ISODate, Map<TravelClass, SeatInventory>>();

  constructor(definition: TrainDefinition) {
    this.id = definition.id;
    this.name = definition.name;
    this.route = new Route(definition.stops);
    this.classBaseFares = new Map(Object.entries(definition.classBaseFares));
    this.classCapacity = new Map(Object.entries(definition.classCapacity));
    this.runningDays = new Set(definition.runningDays);
  }

  /**
   * 有票价也有定员的等级才算开设
   */
  get classes(): TravelClass[] {
    return [...this.classCapacity.keys()].filter(travelClass => this.classBaseFares.has(travelClass));
  }

  offersClass(travelClass: TravelClass): boolean {
    return this.classBaseFares.has(travelClass) && this.classCapacity.has(travelClass);
  }

  serves(sourceCode: string, destinationCode: string): boolean {
    return this.route.serves(sourceCode, destinationCode);
  }

  runsOn(weekday: Weekday): boolean {
    return this.runningDays.has(weekday);
  }

  getRunningDays(): Weekday[] {
    return [...this.runningDays];
  }

  /**
   * 票价 = 等级基准价 × 区间里程 / 100 × 加价系数，最后一步才取两位小数
   *
   * 调用方须先确认 serves 且等级已开设
   */
  getFare(travelClass: TravelClass, sourceCode: string, destinationCode: string, multiplier = 1): number {
    const baseFare = this.classBaseFares.get(travelClass);
    if (baseFare === undefined) {
      throw new InvalidRouteError(`Train ${this.id} has no fare for class ${travelClass}`);
    }
    const distance = this.route.distanceBetween(sourceCode, destinationCode);
    return roundFare(((baseFare * distance) / FARE_DISTANCE_UNIT) * multiplier);
  }

  /**
   * 分配座位；等级未开设或余座不足返回 null
   */
  assignSeats(travelClass: TravelClass, count: number, travelDate: ISODate): string[] | null {
    const inventory = this.inventoryFor(travelClass, travelDate);
    return inventory ? inventory.assign(count) : null;
  }

  releaseSeats(travelClass: TravelClass, seats: string[], travelDate: ISODate): void {
    this.inventoryFor(travelClass, travelDate)?.release(seats);
  }

  getAvailability(travelDate: ISODate): ClassAvailability[] {
    return this.classes.map(travelClass => {
      const capacity = this.classCapacity.get(travelClass) ?? 0;
      const inventory = this.inventories.get(travelDate)?.get(travelClass);
      return {
        travelClass,
        capacity,
        free: inventory ? inventory.freeCount : capacity,
      };
    });
  }

  getStops(): StationStop[] {
    return this.route.getStops();
  }

  toSummary(): TrainSummary {
    return {
      id: this.id,
      name: this.name,
      classes: this.classes,
      runningDays: this.getRunningDays(),
      origin: { ...this.route.origin },
      terminus: { ...this.route.terminus },
    };
  }

  private inventoryFor(travelClass: TravelClass, travelDate: ISODate): SeatInventory | undefined {
    const capacity = this.classCapacity.get(travelClass);
    if (capacity === undefined || !this.classBaseFares.has(travelClass)) {
      return undefined;
    }

    let byClass = this.inventories.get(travelDate);
    if (!byClass) {
      byClass = new Map();
      this.inventories.set(travelDate, byClass);
    }

    let inventory = byClass.get(travelClass);
    if (!inventory) {
      inventory = new SeatInventory(capacity);
      byClass.set(travelClass, inventory);
    }
    return inventory;
  }
}
