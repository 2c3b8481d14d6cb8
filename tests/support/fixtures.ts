import type { Clock } from "../../src/ports/Clock";
import type { MemoryRecord } from "./inMemoryRecordStore";

export const BASE_TIME = Date.parse("2024-03-01T00:00:00Z");

export const TEST_SIGNING_KEY = "test-secret-current";
export const TEST_PREVIOUS_SIGNING_KEY = "test-secret-previous";

export const createMutableClock = (start: Date = new Date("2024-06-01T12:00:00Z")) => {
  let current = start.getTime();
  const clock: Clock & { advance(ms: number): void; set(date: Date): void } = {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
    set: (date) => {
      current = date.getTime();
    }
  };
  return clock;
};

export const recordId = (n: number): string => `oai:test:${String(n).padStart(3, "0")}`;

/**
 * `count` Dublin Core records, one minute apart from BASE_TIME, numbered from 1.
 */
export const makeRecords = (
  count: number,
  overrides: (n: number) => Partial<MemoryRecord> = () => ({})
): MemoryRecord[] =>
  Array.from({ length: count }, (_, index) => {
    const n = index + 1;
    return {
      identifier: recordId(n),
      lastModified: new Date(BASE_TIME + index * 60_000),
      setSpecs: [],
      metadata: { oai_dc: { title: `Record ${n}` } },
      ...overrides(n)
    };
  });
