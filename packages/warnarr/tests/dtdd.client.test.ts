import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CacheStore } from '../src/cache/store.js';
import { DtddClient, DtddRequestError } from '../src/dtdd/client.js';
import { decodeMediaRecord, decodeSearchItems } from '../src/dtdd/decode.js';
import { RateLimitedFetcher } from '../src/dtdd/fetcher.js';
import { EntityMatcher } from '../src/matching/matcher.js';
import { fakeClock, jsonResponse, makeItem, stubFetch } from './helpers.js';

const SEARCH_BODY = {
  items: [
    { id: 11, name: 'Quiet Harbor', releaseYear: 2001, itemType: { name: 'Movie' } },
    { id: 'not-a-number', name: 'Broken' },
    { id: 12, name: 'Quiet Harbor', releaseYear: '2015', itemType: { name: 'TV Show' } },
  ],
};

const MEDIA_BODY = {
  item: { id: 11, name: 'Quiet Harbor' },
  topicItemStats: [
    { yesSum: 10, noSum: 2, topic: { name: 'a dog dies', notName: 'no dogs die' } },
  ],
};

describe('DtddClient', () => {
  let cache: CacheStore;
  let time: ReturnType<typeof fakeClock>;
  let fetcher: RateLimitedFetcher;
  let client: DtddClient;
  let fetchMock: ReturnType<typeof stubFetch>;

  beforeEach(() => {
    fetchMock = stubFetch();
    time = fakeClock();
    cache = new CacheStore(':memory:', { ttlMs: 60_000, now: time.now });
    fetcher = new RateLimitedFetcher(cache, { delayMs: 1_000, now: time.now, sleep: time.sleep });
    client = new DtddClient({ apiKey: 'test-key', baseUrl: 'https://dtdd.test/' }, fetcher, cache);
  });

  afterEach(() => {
    cache.close();
    vi.unstubAllGlobals();
  });

  it('searches by title with the api key header', async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse(SEARCH_BODY));

    const results = await client.search('Quiet Harbor');

    expect(results).toEqual([
      { id: 11, title: 'Quiet Harbor', releaseYear: '2001', itemType: 'Movie' },
      { id: 12, title: 'Quiet Harbor', releaseYear: '2015', itemType: 'TV Show' },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://dtdd.test/dddsearch?q=Quiet+Harbor');
    expect(init?.headers).toEqual({ 'Accept': 'application/json', 'X-API-KEY': 'test-key' });
  });

  it('serves a repeated search from the cache', async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse(SEARCH_BODY));

    await client.search('Quiet Harbor');
    const again = await client.search('  quiet   harbor ');

    expect(again).toHaveLength(2);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(cache.get('search:quiet_harbor')).toEqual(SEARCH_BODY.items);
  });

  it('searches by imdb id', async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ items: [] }));

    await expect(client.searchByImdb('tt0000001')).resolves.toEqual([]);
    expect(fetchMock.mock.calls[0][0]).toBe('https://dtdd.test/dddsearch?imdb=tt0000001');
    expect(cache.get('imdb:tt0000001')).toEqual([]);
  });

  it('fetches media detail records', async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse(MEDIA_BODY));

    const record = await client.getMedia(11);

    expect(fetchMock.mock.calls[0][0]).toBe('https://dtdd.test/media/11');
    expect(record).toEqual({
      topicStats: [{ topicName: 'a dog dies', topicNotName: 'no dogs die', yesCount: 10, noCount: 2 }],
    });
  });

  it('fails on non-success responses and caches nothing', async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ error: 'nope' }, 500, 'Server Error'));

    const err = await client.getMedia(7).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DtddRequestError);
    expect(err).toMatchObject({ status: 500, url: 'https://dtdd.test/media/7' });
    expect(cache.get('media:7')).toBeUndefined();

    fetchMock.mockImplementationOnce(async () => jsonResponse(MEDIA_BODY));
    await expect(client.getMedia(7)).resolves.toHaveProperty('topicStats');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('clearCache empties the cache store', async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse(SEARCH_BODY));
    await client.search('Quiet Harbor');
    expect(client.clearCache()).toBe(1);
  });

  it('second item with the same title is served from cache without waiting', async () => {
    fetchMock
      .mockImplementationOnce(async () => jsonResponse(SEARCH_BODY))
      .mockImplementationOnce(async () => jsonResponse(MEDIA_BODY));
    const matcher = new EntityMatcher(client);

    const first = await matcher.match(makeItem({ id: 'jf-1' }));
    expect(first?.entity.id).toBe(11);
    expect(time.clock.sleeps).toEqual([1_000]);   // search, then media after the spacing

    const second = await matcher.match(makeItem({ id: 'jf-2' }));
    expect(second?.entity.id).toBe(11);
    expect(time.clock.sleeps).toEqual([1_000]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetcher.remoteCalls).toBe(2);
  });
});

describe('decoders', () => {
  it('tolerates missing or odd fields in search items', () => {
    expect(decodeSearchItems(null)).toEqual([]);
    expect(decodeSearchItems([{ id: '5' }, 3, { id: 1.5 }])).toEqual([
      { id: 5, title: '', releaseYear: '', itemType: '' },
    ]);
  });

  it('defaults missing counts to zero', () => {
    expect(decodeMediaRecord({ topicItemStats: [{ topic: { name: 'spiders' }, yesSum: -2 }] })).toEqual({
      topicStats: [{ topicName: 'spiders', topicNotName: '', yesCount: 0, noCount: 0 }],
    });
    expect(decodeMediaRecord('garbage')).toEqual({ topicStats: [] });
  });
});
