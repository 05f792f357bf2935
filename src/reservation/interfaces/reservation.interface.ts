// src/reservation/interfaces/reservation.interface.ts

/**
 * Reservation 模块核心接口定义
 */

export type ISODate = string; // '2026-01-02'
export type ISOTime = string; // '08:30'

/**
 * 车厢等级（如 1A / 2A / 3A / SL），由车次目录定义
 */
export type TravelClass = string;

/**
 * 星期（与目录文件中的缩写一致）
 */
export type Weekday = 'MON' | 'TUE' | 'WED' | 'THU' | 'FRI' | 'SAT' | 'SUN';

/**
 * 途经站
 */
export interface StationStop {
  /** 车站代码，如 NDLS */
  code: string;

  /** 车站名称 */
  name: string;

  arrivalTime: ISOTime;
  departureTime: ISOTime;

  /** 距始发站的累计里程 */
  distanceFromOrigin: number;
}

/**
 * 车次定义（由目录文件加载）
 */
export interface TrainDefinition {
  id: string;
  name: string;
  classBaseFares: Record<TravelClass, number>;
  classCapacity: Record<TravelClass, number>;
  runningDays: Weekday[];
  stops: StationStop[];
}

/**
 * 乘客（订票请求中的输入）
 */
export interface PassengerInput {
  name: string;
  age?: number;
}

/**
 * 已分配座位的乘客
 */
export interface BookedPassenger extends PassengerInput {
  seatNumber: string;
}

/**
 * 订票请求
 */
export interface BookingRequest {
  trainId: string;
  userId: string;
  passengers: PassengerInput[];
  travelClass: TravelClass;
  sourceCode: string;
  destinationCode: string;
  travelDate: ISODate;
  isTatkal: boolean;
}

/**
 * 订票失败原因
 *
 * 调用方可恢复的情况以值的形式返回，不抛异常
 */
export type BookingFailureKind =
  | 'TRAIN_NOT_FOUND'          // 车次不存在
  | 'INVALID_ROUTE'            // 该车次不按此方向经过起止站
  | 'CLASS_NOT_OFFERED'        // 该车次没有此等级
  | 'INVALID_TRAVEL_DATE'      // 出行日期无法解析
  | 'TATKAL_WINDOW_VIOLATION'  // Tatkal 仅限 10:00-12:00
  | 'INSUFFICIENT_CAPACITY';   // 余座不足

export interface BookingFailure {
  kind: BookingFailureKind;
  message: string;
}

/**
 * 座位余量（单个等级）
 */
export interface ClassAvailability {
  travelClass: TravelClass;
  capacity: number;
  free: number;
}

export interface SeatAvailability {
  trainId: string;
  travelDate: ISODate;
  classes: ClassAvailability[];
}

/**
 * 车次摘要（搜索结果）
 */
export interface TrainSummary {
  id: string;
  name: string;
  classes: TravelClass[];
  runningDays: Weekday[];
  origin: StationStop;
  terminus: StationStop;
}

export type TrainSortKey = 'departure' | 'arrival';
export type SortOrder = 'asc' | 'desc';
