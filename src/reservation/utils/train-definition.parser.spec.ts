// src/reservation/utils/train-definition.parser.spec.ts

import { TrainCatalogFormatError } from '../domain/reservation.errors';
import { parseClassValues, parseRunningDays, parseStops, parseTrainRecord } from './train-definition.parser';

describe('train definition parser', () => {
  it('should parse a full record', () => {
    const definition = parseTrainRecord([
      'T1',
      'Test Express',
      'SL::500;3A::800',
      'SL::5;3A::2',
      'MON;wed',
      'AAA::Alpha::6:00::06:10::0;CCC::Charlie::10:30::10:30::200',
    ]);

    expect(definition).toEqual({
      id: 'T1',
      name: 'Test Express',
      classBaseFares: { SL: 500, '3A': 800 },
      classCapacity: { SL: 5, '3A': 2 },
      runningDays: ['MON', 'WED'],
      stops: [
        { code: 'AAA', name: 'Alpha', arrivalTime: '06:00', departureTime: '06:10', distanceFromOrigin: 0 },
        { code: 'CCC', name: 'Charlie', arrivalTime: '10:30', departureTime: '10:30', distanceFromOrigin: 200 },
      ],
    });
  });

  it('should reject a record with the wrong number of fields', () => {
    expect(() => parseTrainRecord(['T1', 'Test'], 3)).toThrow('Line 3: Expected 6 fields, got 2');
  });

  it('should reject malformed class pairs', () => {
    expect(() => parseClassValues('SL500', 'fare')).toThrow(TrainCatalogFormatError);
    expect(() => parseClassValues('SL::abc', 'fare')).toThrow('Invalid fare "abc"');
  });

  it('should keep a class named __proto__ as an own key', () => {
    const values = parseClassValues('__proto__::5;SL::3', 'capacity');

    expect(Object.entries(values)).toEqual([
      ['__proto__', 5],
      ['SL', 3],
    ]);
    expect(Object.getPrototypeOf(values)).toBe(Object.prototype);
  });

  it('should reject fractional capacity', () => {
    expect(() =>
      parseTrainRecord(['T1', 'Test', 'SL::500', 'SL::2.5', 'MON', 'AAA::Alpha::06:00::06:00::0']),
    ).toThrow('Capacity of SL must be an integer');
  });

  it('should de-duplicate running days', () => {
    expect(parseRunningDays('MON;TUE;mon')).toEqual(['MON', 'TUE']);
  });

  it('should reject unknown weekdays', () => {
    expect(() => parseRunningDays('MON;FUNDAY', 4)).toThrow('Line 4: Invalid weekday: "FUNDAY"');
  });

  it('should reject stops with missing parts or bad times', () => {
    expect(() => parseStops('AAA::Alpha::06:00::0')).toThrow('Malformed stop');
    expect(() => parseStops('AAA::Alpha::25:00::06:00::0')).toThrow('Invalid time of day');
    expect(() => parseStops('AAA::Alpha::06:00::06:00::1.5')).toThrow('Distance must be an integer');
  });
});
