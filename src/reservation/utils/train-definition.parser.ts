// src/reservation/utils/train-definition.parser.ts

/**
 * 车次目录记录解析
 *
 * 每条记录 6 个字段：
 *   trainId, trainName, 等级票价, 等级定员, 开行日, 途经站
 * 列表字段内用 ";" 分隔条目，条目内用 "::" 分隔各部分，例如：
 *   SL::90;3A::200
 *   NDLS::New Delhi::16:30::16:55::0;BCT::Mumbai Central::08:35::08:35::1386
 */

import { TrainCatalogFormatError } from '../domain/reservation.errors';
import { StationStop, TrainDefinition, Weekday } from '../interfaces/reservation.interface';
import { parseTimeOfDay, parseWeekday } from './time-of-day.util';

export const ENTRY_DELIMITER = ';';
export const PART_DELIMITER = '::';
export const TRAIN_RECORD_FIELDS = 6;

function splitEntries(value: string): string[] {
  return value
    .split(ENTRY_DELIMITER)
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function parseNumber(value: string, what: string, line?: number): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new TrainCatalogFormatError(`Invalid ${what} "${value}"`, line);
  }
  return parsed;
}

/**
 * 解析 "CLASS::number" 列表
 */
export function parseClassValues(
  value: string,
  what: string,
  line?: number,
): Record<string, number> {
  const entries = splitEntries(value).map((entry): [string, number] => {
    const parts = entry.split(PART_DELIMITER);
    if (parts.length !== 2 || parts[0].trim() === '') {
      throw new TrainCatalogFormatError(`Malformed ${what} entry "${entry}"`, line);
    }
    return [parts[0].trim(), parseNumber(parts[1], what, line)];
  });
  // fromEntries 定义自有属性，"__proto__" 之类的等级名不会改写原型
  return Object.fromEntries(entries);
}

export function parseRunningDays(value: string, line?: number): Weekday[] {
  const days = new Set<Weekday>();
  for (const entry of splitEntries(value)) {
    try {
      days.add(parseWeekday(entry));
    } catch (error) {
      throw new TrainCatalogFormatError(error instanceof Error ? error.message : String(error), line);
    }
  }
  return [...days];
}

/**
 * 解析途经站 "CODE::Name::到达::出发::里程"
 */
export function parseStops(value: string, line?: number): StationStop[] {
  return splitEntries(value).map(entry => {
    const parts = entry.split(PART_DELIMITER).map(part => part.trim());
    if (parts.length !== 5) {
      throw new TrainCatalogFormatError(`Malformed stop "${entry}"`, line);
    }
    const [code, name, arrival, departure, distance] = parts;

    let arrivalTime: string;
    let departureTime: string;
    try {
      arrivalTime = parseTimeOfDay(arrival);
      departureTime = parseTimeOfDay(departure);
    } catch (error) {
      throw new TrainCatalogFormatError(error instanceof Error ? error.message : String(error), line);
    }

    const distanceFromOrigin = parseNumber(distance, 'distance', line);
    if (!Number.isInteger(distanceFromOrigin)) {
      throw new TrainCatalogFormatError(`Distance must be an integer, got "${distance}"`, line);
    }

    return { code, name, arrivalTime, departureTime, distanceFromOrigin };
  });
}

/**
 * 解析一条已按字段拆分的记录
 */
export function parseTrainRecord(fields: string[], line?: number): TrainDefinition {
  if (fields.length !== TRAIN_RECORD_FIELDS) {
    throw new TrainCatalogFormatError(
      `Expected ${TRAIN_RECORD_FIELDS} fields, got ${fields.length}`,
      line,
    );
  }

  const [id, name, fares, capacity, runningDays, stops] = fields.map(field => field.trim());
  if (!id) {
    throw new TrainCatalogFormatError('Missing train id', line);
  }

  const classCapacity = parseClassValues(capacity, 'capacity', line);
  for (const [travelClass, seats] of Object.entries(classCapacity)) {
    if (!Number.isInteger(seats)) {
      throw new TrainCatalogFormatError(`Capacity of ${travelClass} must be an integer`, line);
    }
  }

  const parsedStops = parseStops(stops, line);
  if (parsedStops.length === 0) {
    throw new TrainCatalogFormatError('Train must have at least one stop', line);
  }

  return {
    id,
    name,
    classBaseFares: parseClassValues(fares, 'fare', line),
    classCapacity,
    runningDays: parseRunningDays(runningDays, line),
    stops: parsedStops,
  };
}
