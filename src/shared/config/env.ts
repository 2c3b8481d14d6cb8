export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  HARVEST_SIGNING_KEY: string;
  HARVEST_PREVIOUS_SIGNING_KEY?: string;
  OAI_BASE_URL: string;
  PORT: number;
};

export const MIN_SIGNING_KEY_LENGTH = 16;

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

// Key material never appears in error messages.
const validateSigningKey = (name: string, value: string): string => {
  if (value.length < MIN_SIGNING_KEY_LENGTH) {
    throw new Error(`${name} must be at least ${MIN_SIGNING_KEY_LENGTH} characters long`);
  }
  return value;
};

const parsePort = (raw: string | undefined): number => {
  if (raw == null || raw.trim() === "") return 3000;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [1..65535]`);
  }
  return port;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/oai";
  const MONGO_DB = env.MONGO_DB?.trim() ? env.MONGO_DB.trim() : "oai";
  const HARVEST_SIGNING_KEY = validateSigningKey("HARVEST_SIGNING_KEY", env.HARVEST_SIGNING_KEY ?? "");
  const PORT = parsePort(env.PORT);
  const OAI_BASE_URL = validateHttpUrl("OAI_BASE_URL", env.OAI_BASE_URL ?? `http://localhost:${PORT}/oai`);

  const result: Env = { MONGO_URI, MONGO_DB, HARVEST_SIGNING_KEY, OAI_BASE_URL, PORT };
  const previous = env.HARVEST_PREVIOUS_SIGNING_KEY;
  if (previous != null && previous !== "") {
    result.HARVEST_PREVIOUS_SIGNING_KEY = validateSigningKey("HARVEST_PREVIOUS_SIGNING_KEY", previous);
  }
  return result;
};
