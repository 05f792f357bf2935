// src/reservation/domain/route.ts

import { StationStop } from '../interfaces/reservation.interface';
import { InvalidRouteError } from './reservation.errors';

/**
 * 线路：按运行方向排列的途经站，构造后只读
 */
export class Route {
  private readonly stops: readonly StationStop[];
  private readonly indexByCode = new Map<string, number>();

  constructor(stops: StationStop[]) {
    if (stops.length === 0) {
      throw new InvalidRouteError('Route must have at least one stop');
    }

    stops.forEach((stop, index) => {
      if (!Number.isInteger(stop.distanceFromOrigin) || stop.distanceFromOrigin < 0) {
        throw new InvalidRouteError(`Stop ${stop.code} has an invalid distance ${stop.distanceFromOrigin}`);
      }
      if (index > 0 && stop.distanceFromOrigin < stops[index - 1].distanceFromOrigin) {
        throw new InvalidRouteError(`Distance decreases at stop ${stop.code}`);
      }
      if (this.indexByCode.has(stop.code)) {
        throw new InvalidRouteError(`Stop ${stop.code} appears more than once`);
      }
      this.indexByCode.set(stop.code, index);
    });

    this.stops = stops.map(stop => ({ ...stop }));
  }

  get origin(): StationStop {
    return this.stops[0];
  }

  get terminus(): StationStop {
    return this.stops[this.stops.length - 1];
  }

  /**
   * 站点在线路中的位置，不存在返回 -1
   */
  indexOf(code: string): number {
    return this.indexByCode.get(code) ?? -1;
  }

  /**
   * 起点必须严格位于终点之前
   */
  serves(sourceCode: string, destinationCode: string): boolean {
    const sourceIndex = this.indexOf(sourceCode);
    const destinationIndex = this.indexOf(destinationCode);
    return sourceIndex !== -1 && destinationIndex !== -1 && sourceIndex < destinationIndex;
  }

  /**
   * 两站之间的里程（调用方需先确认 serves）
   */
  distanceBetween(sourceCode: string, destinationCode: string): number {
    if (!this.serves(sourceCode, destinationCode)) {
      throw new InvalidRouteError(`Route does not serve ${sourceCode} -> ${destinationCode}`);
    }
    const source = this.stops[this.indexOf(sourceCode)];
    const destination = this.stops[this.indexOf(destinationCode)];
    return destination.distanceFromOrigin - source.distanceFromOrigin;
  }

  getStops(): StationStop[] {
    return this.stops.map(stop => ({ ...stop }));
  }
}
