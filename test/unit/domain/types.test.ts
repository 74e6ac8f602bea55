import { describe, it, expect } from 'vitest';
import {
  CANONICAL_COLUMNS,
  createFetchWindow,
  createIsoDate,
  createTaxiType,
  emptyTable,
  isValidIsoDate,
  isValidTaxiType,
  isoDateToUtc,
  utcDate,
} from '@domain/types';
import { ConfigurationError, IngestionError } from '@domain/errors';

describe('Domain Types', () => {
  describe('IsoDate validation', () => {
    it('accepts real calendar dates', () => {
      expect(isValidIsoDate('2023-01-01')).toBe(true);
      expect(isValidIsoDate('2024-02-29')).toBe(true); // leap day
    });

    it('accepts years before 100', () => {
      expect(isValidIsoDate('0050-01-01')).toBe(true);
      expect(isValidIsoDate('0000-02-29')).toBe(true); // year 0 is a leap year
      expect(isValidIsoDate('0099-02-29')).toBe(false);
      expect(isoDateToUtc(createIsoDate('0050-01-01')).getUTCFullYear()).toBe(50);
    });

    it('rejects impossible or malformed dates', () => {
      expect(isValidIsoDate('2023-02-29')).toBe(false);
      expect(isValidIsoDate('2023-13-01')).toBe(false);
      expect(isValidIsoDate('2023-1-1')).toBe(false);
      expect(isValidIsoDate('2023-01-01T00:00:00Z')).toBe(false);
      expect(isValidIsoDate('')).toBe(false);
    });

    it('trims input and throws ConfigurationError on invalid dates', () => {
      expect(createIsoDate(' 2023-03-01 ')).toBe('2023-03-01');
      expect(() => createIsoDate('03/01/2023')).toThrow(ConfigurationError);
      expect(() => createIsoDate('03/01/2023')).toThrow(
        'Invalid date: 03/01/2023'
      );
    });

    it('converts to UTC midnight', () => {
      expect(isoDateToUtc(createIsoDate('2023-01-15')).toISOString()).toBe(
        '2023-01-15T00:00:00.000Z'
      );
    });
  });

  describe('TaxiType validation', () => {
    it('accepts published file prefixes', () => {
      ['yellow', 'green', 'fhv', 'fhvhv'].forEach((t) =>
        expect(isValidTaxiType(t)).toBe(true)
      );
    });

    it('rejects values that cannot form a file name', () => {
      expect(isValidTaxiType('Yellow')).toBe(false);
      expect(isValidTaxiType('yellow/../green')).toBe(false);
      expect(isValidTaxiType('')).toBe(false);
      expect(() => createTaxiType('  ')).toThrow(ConfigurationError);
    });
  });

  describe('utcDate', () => {
    it('builds UTC dates without remapping two-digit years', () => {
      expect(utcDate(50, 0, 1).toISOString()).toBe('0050-01-01T00:00:00.000Z');
      expect(utcDate(2023, 1, 10, 8, 5, 30, 250).toISOString()).toBe(
        '2023-02-10T08:05:30.250Z'
      );
    });
  });

  describe('FetchWindow', () => {
    it('creates a frozen half-open window', () => {
      const window = createFetchWindow(
        createIsoDate('2023-01-01'),
        createIsoDate('2023-03-01')
      );
      expect(window.start.toISOString()).toBe('2023-01-01T00:00:00.000Z');
      expect(window.end.toISOString()).toBe('2023-03-01T00:00:00.000Z');
      expect(Object.isFrozen(window)).toBe(true);
    });

    it('allows an empty window where start equals end', () => {
      const window = createFetchWindow(
        createIsoDate('2023-01-01'),
        createIsoDate('2023-01-01')
      );
      expect(window.start.getTime()).toBe(window.end.getTime());
    });

    it('rejects a start after the end', () => {
      expect(() =>
        createFetchWindow(createIsoDate('2023-03-01'), createIsoDate('2023-01-01'))
      ).toThrow('start date 2023-03-01 is after end date 2023-01-01');
    });
  });

  describe('Canonical schema', () => {
    it('declares the 11 canonical columns in order', () => {
      expect(CANONICAL_COLUMNS).toEqual([
        'taxi_type',
        'pickup_datetime',
        'dropoff_datetime',
        'pickup_location_id',
        'dropoff_location_id',
        'passenger_count',
        'trip_distance',
        'fare_amount',
        'total_amount',
        'payment_type',
        'extracted_at',
      ]);
    });

    it('builds an empty table with a copy of the columns', () => {
      const table = emptyTable(CANONICAL_COLUMNS);
      expect(table.rows).toHaveLength(0);
      expect(table.columns).toEqual([...CANONICAL_COLUMNS]);
      expect(table.columns).not.toBe(CANONICAL_COLUMNS);
    });
  });

  describe('Errors', () => {
    it('tags configuration errors with their type and class name', () => {
      const error = new ConfigurationError('bad');
      expect(error).toBeInstanceOf(IngestionError);
      expect(error.type).toBe('CONFIGURATION');
      expect(error.name).toBe('ConfigurationError');
    });
  });
});
