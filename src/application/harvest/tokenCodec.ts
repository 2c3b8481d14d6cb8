import { createHmac, timingSafeEqual } from "crypto";
import { createCursor, isCursorExpired, type Cursor } from "../../core/harvest/cursor";
import type { Granularity } from "../../core/harvest/granularity";
import { badResumptionToken } from "../../core/harvest/harvest.errors";
import type { Clock } from "../../ports/Clock";
import type { SigningKeySource } from "../../ports/SigningKeySource";

/**
 * Wire layout: `<payload>.<tag>`, both base64url without padding.
 * The payload is the cursor as JSON with sorted, abbreviated keys; the tag is
 * HMAC-SHA256 over the payload bytes.
 */
const TOKEN_VERSION = 1;
const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

type TokenPayload = {
  v: number;
  f: string;
  g: "d" | "s";
  n: number;
  c: number;
  i: number;
  e: number;
  s?: string;
  a?: number;
  u?: number;
  wt?: number;
  wi?: string;
};

export type TokenCodec = {
  encode(cursor: Cursor): string;
  decode(token: string): Cursor;
};

export type TokenCodecDeps = {
  keys: SigningKeySource;
  clock: Clock;
};

class MalformedTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedTokenError";
  }
}

const granularityCodes: Record<Granularity, TokenPayload["g"]> = { day: "d", second: "s" };

const toPayload = (cursor: Cursor): TokenPayload => {
  const payload: TokenPayload = {
    v: TOKEN_VERSION,
    f: cursor.metadataFormat,
    g: granularityCodes[cursor.granularity],
    n: cursor.pageSize,
    c: cursor.delivered,
    i: cursor.issuedAt.getTime(),
    e: cursor.expiresAfterMs
  };
  if (cursor.setFilter != null) payload.s = cursor.setFilter;
  if (cursor.fromInclusive) payload.a = cursor.fromInclusive.getTime();
  if (cursor.untilInclusive) payload.u = cursor.untilInclusive.getTime();
  if (cursor.watermark) {
    payload.wt = cursor.watermark.lastModified.getTime();
    payload.wi = cursor.watermark.identifier;
  }
  return payload;
};

const serializePayload = (payload: TokenPayload): string =>
  JSON.stringify(payload, Object.keys(payload).sort());

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readInteger = (source: Record<string, unknown>, key: string): number => {
  const value = source[key];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new MalformedTokenError(`field ${key} must be an integer`);
  }
  return value;
};

const readOptionalInteger = (source: Record<string, unknown>, key: string): number | undefined =>
  source[key] === undefined ? undefined : readInteger(source, key);

const readString = (source: Record<string, unknown>, key: string): string => {
  const value = source[key];
  if (typeof value !== "string") {
    throw new MalformedTokenError(`field ${key} must be a string`);
  }
  return value;
};

const readOptionalString = (source: Record<string, unknown>, key: string): string | undefined =>
  source[key] === undefined ? undefined : readString(source, key);

const fromPayload = (raw: unknown): Cursor => {
  if (!isRecord(raw)) throw new MalformedTokenError("payload is not an object");
  if (raw.v !== TOKEN_VERSION) throw new MalformedTokenError(`unsupported version ${String(raw.v)}`);

  const granularityCode = raw.g;
  if (granularityCode !== "d" && granularityCode !== "s") {
    throw new MalformedTokenError("unknown granularity");
  }

  const watermarkTime = readOptionalInteger(raw, "wt");
  const watermarkIdentifier = readOptionalString(raw, "wi");
  if ((watermarkTime === undefined) !== (watermarkIdentifier === undefined)) {
    throw new MalformedTokenError("watermark must carry both timestamp and identifier");
  }

  const from = readOptionalInteger(raw, "a");
  const until = readOptionalInteger(raw, "u");

  return createCursor({
    metadataFormat: readString(raw, "f"),
    setFilter: readOptionalString(raw, "s"),
    granularity: granularityCode === "d" ? "day" : "second",
    fromInclusive: from === undefined ? undefined : new Date(from),
    untilInclusive: until === undefined ? undefined : new Date(until),
    watermark:
      watermarkTime === undefined || watermarkIdentifier === undefined
        ? undefined
        : { lastModified: new Date(watermarkTime), identifier: watermarkIdentifier },
    pageSize: readInteger(raw, "n"),
    delivered: readInteger(raw, "c"),
    issuedAt: new Date(readInteger(raw, "i")),
    expiresAfterMs: readInteger(raw, "e")
  });
};

const sign = (key: string, payload: Buffer): Buffer => createHmac("sha256", key).update(payload).digest();

const tagMatches = (key: string, payload: Buffer, tag: Buffer): boolean => {
  const expected = sign(key, payload);
  return expected.length === tag.length && timingSafeEqual(expected, tag);
};

/** Node's base64url decoder ignores stray bits; only the canonical spelling of a segment is accepted. */
const decodeSegment = (segment: string): Buffer => {
  if (!SEGMENT_PATTERN.test(segment)) throw new MalformedTokenError("segment is not base64url");
  const bytes = Buffer.from(segment, "base64url");
  if (bytes.toString("base64url") !== segment) throw new MalformedTokenError("segment is not canonical base64url");
  return bytes;
};

export const createTokenCodec = (deps: TokenCodecDeps): TokenCodec => {
  const { keys, clock } = deps;

  const verify = (payload: Buffer, tag: Buffer): boolean => {
    if (tagMatches(keys.currentKey(), payload, tag)) return true;
    const previous = keys.previousKey();
    return previous !== undefined && tagMatches(previous, payload, tag);
  };

  return {
    encode: (cursor) => {
      const payload = Buffer.from(serializePayload(toPayload(cursor)), "utf8");
      const tag = sign(keys.currentKey(), payload);
      return `${payload.toString("base64url")}.${tag.toString("base64url")}`;
    },

    decode: (token) => {
      let cursor: Cursor;
      try {
        const segments = token.split(".");
        if (segments.length !== 2) throw new MalformedTokenError("expected exactly two segments");
        const [payloadSegment = "", tagSegment = ""] = segments;
        const payload = decodeSegment(payloadSegment);
        const tag = decodeSegment(tagSegment);

        if (!verify(payload, tag)) throw new MalformedTokenError("integrity tag mismatch");

        cursor = fromPayload(JSON.parse(payload.toString("utf8")));
      } catch (error) {
        throw badResumptionToken(error);
      }

      if (isCursorExpired(cursor, clock.now())) {
        throw badResumptionToken();
      }
      return cursor;
    }
  };
};
