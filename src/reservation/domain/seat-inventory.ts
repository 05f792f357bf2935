// src/reservation/domain/seat-inventory.ts

/**
 * 座位池（单个车次 + 等级 + 日期）
 *
 * 空闲座位按座位号升序保存，assign 总是返回号码最小的座位，
 * 相同状态下的分配结果可复现
 */

/**
 * 座位号比较：纯数字按数值，其它按字典序
 */
export function compareSeatIds(a: string, b: string): number {
  const numA = Number(a);
  const numB = Number(b);
  if (Number.isInteger(numA) && Number.isInteger(numB)) {
    return numA - numB;
  }
  return a.localeCompare(b);
}

export class SeatInventory {
  private readonly free: string[];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Seat capacity must be a non-negative integer, got ${capacity}`);
    }
    this.free = Array.from({ length: capacity }, (_, i) => String(i + 1));
  }

  get freeCount(): number {
    return this.free.length;
  }

  /**
   * 当前空闲座位（快照）
   */
  freeSeats(): string[] {
    return [...this.free];
  }

  /**
   * 分配 count 个座位；余座不足时返回 null，且不做任何修改
   */
  assign(count: number): string[] | null {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Seat count must be a positive integer, got ${count}`);
    }
    if (this.free.length < count) {
      return null;
    }
    return this.free.splice(0, count);
  }

  /**
   * 归还座位；已在池中的座位忽略
   */
  release(seats: string[]): void {
    for (const seat of seats) {
      const index = this.lowerBound(seat);
      if (this.free[index] !== seat) {
        this.free.splice(index, 0, seat);
      }
    }
  }

  private lowerBound(seat: string): number {
    let low = 0;
    let high = this.free.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareSeatIds(this.free[mid], seat) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
