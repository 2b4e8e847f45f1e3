import { vi } from 'vitest';

import type { MediaItem } from '../src/matching/types.js';

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Stubs global fetch; each test queues responses with mockImplementationOnce */
export function stubFetch() {
  const fetchMock = vi.fn(async (_url: string, _init?: FetchInit): Promise<Response> => {
    throw new Error('unexpected fetch');
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function makeItem(overrides: Partial<MediaItem> = {}): MediaItem {
  return {
    id: 'jf-1',
    title: 'Quiet Harbor',
    year: 2001,
    imdbId: null,
    description: 'Plot text',
    ...overrides,
  };
}

/** Manual clock; sleep() advances it and records each wait */
export function fakeClock() {
  const clock: { t: number; sleeps: number[] } = { t: 0, sleeps: [] };
  const now = () => clock.t;
  const sleep = async (ms: number) => {
    clock.sleeps.push(ms);
    clock.t += ms;
  };
  return { clock, now, sleep };
}
