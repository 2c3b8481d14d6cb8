export type Granularity = "day" | "second";

export type UtcDatestamp = {
  instant: Date;
  granularity: Granularity;
};

export class InvalidDatestampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDatestampError";
  }
}

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const SECOND_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

const stepMs: Record<Granularity, number> = {
  day: 24 * 60 * 60 * 1000,
  second: 1000
};

const buildUtcInstant = (parts: number[], raw: string): Date => {
  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = parts;
  // setUTCFullYear keeps two-digit years literal, unlike Date.UTC.
  const instant = new Date(0);
  instant.setUTCFullYear(year, month - 1, day);
  instant.setUTCHours(hours, minutes, seconds, 0);

  const roundTrips =
    instant.getUTCFullYear() === year &&
    instant.getUTCMonth() === month - 1 &&
    instant.getUTCDate() === day &&
    instant.getUTCHours() === hours &&
    instant.getUTCMinutes() === minutes &&
    instant.getUTCSeconds() === seconds;
  if (!roundTrips) {
    throw new InvalidDatestampError(`"${raw}" is not a valid calendar date`);
  }

  return instant;
};

/**
 * Parses a protocol datestamp (`YYYY-MM-DD` or `YYYY-MM-DDThh:mm:ssZ`).
 */
export const parseUtcDatestamp = (raw: string): UtcDatestamp => {
  const dayMatch = DAY_PATTERN.exec(raw);
  if (dayMatch) {
    return { instant: buildUtcInstant(dayMatch.slice(1).map(Number), raw), granularity: "day" };
  }

  const secondMatch = SECOND_PATTERN.exec(raw);
  if (secondMatch) {
    return { instant: buildUtcInstant(secondMatch.slice(1).map(Number), raw), granularity: "second" };
  }

  throw new InvalidDatestampError(`"${raw}" is neither YYYY-MM-DD nor YYYY-MM-DDThh:mm:ssZ`);
};

/** First instant no longer covered by an inclusive `until` at the given granularity. */
export const exclusiveUpperBound = (untilInclusive: Date, granularity: Granularity): Date =>
  new Date(untilInclusive.getTime() + stepMs[granularity]);

export const formatDatestamp = (instant: Date, granularity: Granularity): string => {
  const iso = instant.toISOString();
  return granularity === "day" ? iso.slice(0, 10) : `${iso.slice(0, 19)}Z`;
};

