import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@domain/errors';
import { createIngestionConfig } from '@etl/ingestion-config';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_FETCH_TIMEOUT_MS,
  TRIP_DATA_BASE_URL,
} from '@etl/config';

describe('Ingestion configuration', () => {
  it('applies defaults for optional fields', () => {
    const config = createIngestionConfig({
      startDate: '2023-01-01',
      endDate: '2023-03-01',
    });

    expect(config.startDate).toBe('2023-01-01');
    expect(config.endDate).toBe('2023-03-01');
    expect(config.taxiTypes).toEqual(['yellow']);
    expect(config.baseUrl).toBe(TRIP_DATA_BASE_URL);
    expect(config.fetchTimeoutMs).toBe(DEFAULT_FETCH_TIMEOUT_MS);
    expect(config.concurrency).toBe(DEFAULT_CONCURRENCY);
    expect(config.window.start.toISOString()).toBe('2023-01-01T00:00:00.000Z');
    expect(config.window.end.toISOString()).toBe('2023-03-01T00:00:00.000Z');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps taxi types in the given order', () => {
    const config = createIngestionConfig({
      startDate: '2023-01-01',
      endDate: '2023-02-01',
      taxiTypes: ['green', ' yellow '],
    });
    expect(config.taxiTypes).toEqual(['green', 'yellow']);
  });

  it('fails when the window dates are missing', () => {
    expect(() => createIngestionConfig({ endDate: '2023-02-01' })).toThrow(
      'Missing required window configuration: startDate'
    );
    expect(() => createIngestionConfig({ startDate: '', endDate: ' ' })).toThrow(
      'Missing required window configuration: startDate, endDate'
    );
    expect(() => createIngestionConfig({})).toThrow(ConfigurationError);
  });

  it('rejects malformed or inverted windows', () => {
    expect(() =>
      createIngestionConfig({ startDate: '2023-01-01', endDate: '2023-02-30' })
    ).toThrow('Invalid date: 2023-02-30');
    expect(() =>
      createIngestionConfig({ startDate: '2023-03-01', endDate: '2023-01-01' })
    ).toThrow(ConfigurationError);
  });

  it('rejects empty, invalid and duplicate taxi types', () => {
    const window = { startDate: '2023-01-01', endDate: '2023-02-01' };
    expect(() => createIngestionConfig({ ...window, taxiTypes: [] })).toThrow(
      'At least one taxi type is required'
    );
    expect(() =>
      createIngestionConfig({ ...window, taxiTypes: ['Yellow'] })
    ).toThrow('Invalid taxi type: "Yellow"');
    expect(() =>
      createIngestionConfig({ ...window, taxiTypes: ['green', 'yellow', 'green'] })
    ).toThrow('Duplicate taxi types: green');
  });

  it('strips trailing slashes from the base URL and validates it', () => {
    const window = { startDate: '2023-01-01', endDate: '2023-02-01' };
    expect(
      createIngestionConfig({ ...window, baseUrl: 'http://mirror.test/data/' })
        .baseUrl
    ).toBe('http://mirror.test/data');
    expect(() =>
      createIngestionConfig({ ...window, baseUrl: 'not a url' })
    ).toThrow('Invalid base URL: not a url');
    expect(() =>
      createIngestionConfig({ ...window, baseUrl: 'ftp://mirror.test' })
    ).toThrow('Base URL must use http(s): ftp://mirror.test');
  });

  it('rejects non-positive timeout and concurrency', () => {
    const window = { startDate: '2023-01-01', endDate: '2023-02-01' };
    expect(() =>
      createIngestionConfig({ ...window, fetchTimeoutMs: 0 })
    ).toThrow('fetchTimeoutMs must be a positive integer, got 0');
    expect(() =>
      createIngestionConfig({ ...window, concurrency: 1.5 })
    ).toThrow('concurrency must be a positive integer, got 1.5');
  });
});
