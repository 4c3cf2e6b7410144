/**
 * Unit tests for the date conversion tools and the methods cache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  GregorianToHijriInputSchema,
  handleGregorianToHijri,
  handleHijriToGregorian,
  handleListCalculationMethods,
} from './date-conversion.js';
import {
  createTestContext,
  requestedUrls,
  resultJson,
  silenceLogs,
  stubFetchJson,
} from '../../tests/helpers/aladhan-stub.js';

const METHODS_ENVELOPE = {
  code: 200,
  status: 'OK',
  data: {
    MWL: { id: 3, name: 'Muslim World League', params: { Fajr: 18, Isha: 17 } },
    EGYPT: { id: 5, name: 'Egyptian General Authority of Survey', params: { Fajr: 19.5, Isha: 17.5 } },
  },
};

describe('list_calculation_methods', () => {
  beforeEach(() => {
    silenceLogs();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should fetch once and serve the second call from the cache', async () => {
    const fetchMock = stubFetchJson(METHODS_ENVELOPE);
    const { context } = createTestContext();

    const first = await handleListCalculationMethods(context);
    const second = await handleListCalculationMethods(context);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestedUrls(fetchMock)).toEqual(['https://api.aladhan.com/v1/methods']);
    expect(resultJson(first)).toEqual(METHODS_ENVELOPE.data);
    expect(resultJson(second)).toEqual(METHODS_ENVELOPE.data);
  });

  it('should refetch once the cached entry is older than the TTL', async () => {
    const fetchMock = stubFetchJson(METHODS_ENVELOPE);
    let now = 1_700_000_000_000;
    const { context } = createTestContext(() => now);

    await handleListCalculationMethods(context);
    now += 86_399_000;
    await handleListCalculationMethods(context);
    expect(fetchMock).toHaveBeenCalledTimes(1);

    now += 1_000;
    await handleListCalculationMethods(context);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should cache the raw envelope', async () => {
    stubFetchJson(METHODS_ENVELOPE);
    const { context, cache } = createTestContext();

    await handleListCalculationMethods(context);

    expect(cache.get('methods')).toEqual(METHODS_ENVELOPE);
  });

  it('should not cache a failed lookup', async () => {
    const fetchMock = stubFetchJson({ code: 500, status: 'Server Error' }, 500);
    const { context, cache } = createTestContext();

    await expect(handleListCalculationMethods(context)).rejects.toMatchObject({
      code: 'UPSTREAM_UNAVAILABLE',
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(cache.size).toBe(0);
  });
});

describe('date conversion', () => {
  beforeEach(() => {
    silenceLogs();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should convert a Gregorian date through /gToH', async () => {
    const hijri = { hijri: { date: '05-09-1445', month: { number: 9, en: 'Ramaḍān' } } };
    const fetchMock = stubFetchJson({ code: 200, status: 'OK', data: hijri });
    const { context } = createTestContext();

    const result = await handleGregorianToHijri({ date: '2024-03-15' }, context);

    expect(requestedUrls(fetchMock)).toEqual(['https://api.aladhan.com/v1/gToH?date=2024-03-15']);
    expect(resultJson(result)).toEqual(hijri);
  });

  it('should convert a Hijri date through /hToG', async () => {
    const gregorian = { gregorian: { date: '15-03-2024' } };
    const fetchMock = stubFetchJson({ code: 200, status: 'OK', data: gregorian });
    const { context } = createTestContext();

    const result = await handleHijriToGregorian({ date: '05-09-1445' }, context);

    expect(requestedUrls(fetchMock)).toEqual(['https://api.aladhan.com/v1/hToG?date=05-09-1445']);
    expect(resultJson(result)).toEqual(gregorian);
  });

  it('should return the whole envelope when data is missing', async () => {
    stubFetchJson({ status: 'OK' });
    const { context } = createTestContext();

    const result = await handleGregorianToHijri({ date: '2024-03-15' }, context);

    expect(resultJson(result)).toEqual({ status: 'OK' });
  });

  it('should require a date', () => {
    const parsed = GregorianToHijriInputSchema.safeParse({});

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe("Required: 'date' as YYYY-MM-DD");
  });
});
