import type { Granularity } from "./granularity";

/**
 * Position of the last record already delivered, in `(lastModified, identifier)` order.
 */
export type Watermark = Readonly<{
  lastModified: Date;
  identifier: string;
}>;

/**
 * Complete resumable state of one harvest. Never stored server-side: it travels
 * to the harvester inside the resumption token and comes back on the next request.
 */
export type Cursor = Readonly<{
  metadataFormat: string;
  setFilter?: string;
  granularity: Granularity;
  fromInclusive?: Date;
  untilInclusive?: Date;
  watermark?: Watermark;
  pageSize: number;
  /** Records delivered by earlier pages of the same harvest. */
  delivered: number;
  issuedAt: Date;
  expiresAfterMs: number;
}>;

export class InvalidCursorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCursorError";
  }
}

export class WatermarkRegressionError extends Error {
  constructor(previous: Watermark, next: Watermark) {
    super(
      `Watermark must advance: (${next.lastModified.toISOString()}, ${next.identifier}) ` +
        `is not after (${previous.lastModified.toISOString()}, ${previous.identifier})`
    );
    this.name = "WatermarkRegressionError";
  }
}

const isValidDate = (value: Date): boolean => !Number.isNaN(value.getTime());

const copyDate = (value: Date): Date => new Date(value.getTime());

export const compareWatermarks = (a: Watermark, b: Watermark): number => {
  const byTime = a.lastModified.getTime() - b.lastModified.getTime();
  if (byTime !== 0) return byTime < 0 ? -1 : 1;
  if (a.identifier === b.identifier) return 0;
  return a.identifier < b.identifier ? -1 : 1;
};

export const watermarkOf = (record: { lastModified: Date; identifier: string }): Watermark =>
  Object.freeze({ lastModified: copyDate(record.lastModified), identifier: record.identifier });

/**
 * Validates and freezes a cursor. Optional fields left undefined are omitted
 * rather than stored as `undefined`.
 */
export const createCursor = (fields: Cursor): Cursor => {
  if (fields.metadataFormat.trim() === "") {
    throw new InvalidCursorError("metadataFormat must not be empty");
  }
  if (!Number.isInteger(fields.pageSize) || fields.pageSize < 1) {
    throw new InvalidCursorError(`pageSize must be a positive integer. Received: ${fields.pageSize}`);
  }
  if (!Number.isInteger(fields.delivered) || fields.delivered < 0) {
    throw new InvalidCursorError(`delivered must be a non-negative integer. Received: ${fields.delivered}`);
  }
  if (!Number.isInteger(fields.expiresAfterMs) || fields.expiresAfterMs <= 0) {
    throw new InvalidCursorError(`expiresAfterMs must be a positive integer. Received: ${fields.expiresAfterMs}`);
  }

  const dates = [fields.issuedAt, fields.fromInclusive, fields.untilInclusive, fields.watermark?.lastModified];
  if (dates.some((date) => date != null && !isValidDate(date))) {
    throw new InvalidCursorError("cursor timestamps must be valid dates");
  }
  if (fields.fromInclusive && fields.untilInclusive && fields.fromInclusive > fields.untilInclusive) {
    throw new InvalidCursorError("fromInclusive must not be after untilInclusive");
  }
  if (fields.watermark && fields.watermark.identifier === "") {
    throw new InvalidCursorError("watermark identifier must not be empty");
  }

  const cursor: {
    -readonly [K in keyof Cursor]: Cursor[K];
  } = {
    metadataFormat: fields.metadataFormat,
    granularity: fields.granularity,
    pageSize: fields.pageSize,
    delivered: fields.delivered,
    issuedAt: copyDate(fields.issuedAt),
    expiresAfterMs: fields.expiresAfterMs
  };
  if (fields.setFilter != null) cursor.setFilter = fields.setFilter;
  if (fields.fromInclusive) cursor.fromInclusive = copyDate(fields.fromInclusive);
  if (fields.untilInclusive) cursor.untilInclusive = copyDate(fields.untilInclusive);
  if (fields.watermark) cursor.watermark = watermarkOf(fields.watermark);

  return Object.freeze(cursor);
};

/**
 * Builds the cursor for the page after `cursor`, positioned on the last emitted record.
 */
export const deriveSuccessor = (
  cursor: Cursor,
  lastEmitted: Watermark,
  args: { emitted: number; issuedAt: Date }
): Cursor => {
  if (cursor.watermark && compareWatermarks(lastEmitted, cursor.watermark) <= 0) {
    throw new WatermarkRegressionError(cursor.watermark, lastEmitted);
  }

  return createCursor({
    ...cursor,
    watermark: lastEmitted,
    delivered: cursor.delivered + args.emitted,
    issuedAt: args.issuedAt
  });
};

export const cursorDeadline = (cursor: Cursor): Date =>
  new Date(cursor.issuedAt.getTime() + cursor.expiresAfterMs);

export const isCursorExpired = (cursor: Cursor, now: Date): boolean =>
  now.getTime() > cursorDeadline(cursor).getTime();
