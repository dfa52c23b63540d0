import { randomUUID } from 'node:crypto';
import RedisMock from 'ioredis-mock';
import { RedisPasteStore } from '../src/storage/redisPasteStore';
import type { Clock, Nanos } from '../src/types';

// ioredis-mock instances share one dataset, so every store gets its own prefix
export function createTestStore() {
  const redis = new RedisMock();
  const prefix = `test:${randomUUID()}:`;
  const store = new RedisPasteStore(redis, { keyPrefix: prefix });
  return { redis, store, filesKey: `${prefix}files`, sequenceKey: `${prefix}files:seq` };
}

export interface ManualClock {
  clock: Clock;
  advance(by: Nanos): void;
  set(to: Nanos): void;
}

export function manualClock(start: Nanos = 1_700_000_000_000_000_000n): ManualClock {
  let now = start;
  return {
    clock: () => now,
    advance: (by) => {
      now += by;
    },
    set: (to) => {
      now = to;
    },
  };
}

export function form(fields: Record<string, string>) {
  return new URLSearchParams(fields).toString();
}

export const FORM_HEADERS = { 'content-type': 'application/x-www-form-urlencoded' };

export interface MultipartField {
  name: string;
  value: string;
  filename?: string;
}

export function multipart(fields: MultipartField[]) {
  const boundary = 'paste-test-boundary';
  const lines: string[] = [];
  for (const f of fields) {
    lines.push(`--${boundary}`);
    if (f.filename) {
      lines.push(`Content-Disposition: form-data; name="${f.name}"; filename="${f.filename}"`, 'Content-Type: text/plain');
    } else {
      lines.push(`Content-Disposition: form-data; name="${f.name}"`);
    }
    lines.push('', f.value);
  }
  lines.push(`--${boundary}--`, '');
  return {
    payload: lines.join('\r\n'),
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
  };
}
