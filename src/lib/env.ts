export const DEBUG = process.env.DEBUG === "true";

export type NotifySource = "realtime" | "listen";

export type PlayConfig = {
  databaseUrl: string;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
  notifySource: NotifySource;
  hubCapacity: number;
  heartbeatMs: number;
  poolMax: number;
};

const DEFAULT_HUB_CAPACITY = 10;
const DEFAULT_HEARTBEAT_MS = 1_000;
const DEFAULT_POOL_MAX = 10;

type Env = Record<string, string | undefined>;

const readTrimmed = (env: Env, key: string) => {
  const value = env[key]?.trim();
  return value ? value : null;
};

const readPositiveInt = (env: Env, key: string, fallback: number) => {
  const raw = readTrimmed(env, key);
  if (raw === null) {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
};

const readNotifySource = (env: Env): NotifySource | null => {
  const raw = readTrimmed(env, "PLAY_NOTIFY_SOURCE") ?? "realtime";
  return raw === "realtime" || raw === "listen" ? raw : null;
};

export const getConfigErrors = (env: Env = process.env) => {
  const errors: string[] = [];

  if (!readTrimmed(env, "DATABASE_URL")) {
    errors.push("Missing DATABASE_URL.");
  }

  const notifySource = readNotifySource(env);
  if (!notifySource) {
    errors.push("PLAY_NOTIFY_SOURCE must be either realtime or listen.");
  }

  if (notifySource === "realtime") {
    const supabaseUrl = readTrimmed(env, "SUPABASE_URL");
    if (!supabaseUrl) {
      errors.push("Missing SUPABASE_URL.");
    } else if (!supabaseUrl.startsWith("https://") && !supabaseUrl.startsWith("http://")) {
      errors.push("SUPABASE_URL must start with https:// or http://.");
    }

    if (!readTrimmed(env, "SUPABASE_SERVICE_ROLE_KEY")) {
      errors.push("Missing SUPABASE_SERVICE_ROLE_KEY.");
    }
  }

  for (const key of ["PLAY_HUB_CAPACITY", "PLAY_STREAM_HEARTBEAT_MS", "PLAY_DB_POOL_MAX"]) {
    if (readPositiveInt(env, key, 1) === null) {
      errors.push(`${key} must be a positive integer.`);
    }
  }

  return errors;
};

/** Reads the play configuration; call getConfigErrors first. */
export const readPlayConfig = (env: Env = process.env): PlayConfig => {
  const errors = getConfigErrors(env);
  const databaseUrl = readTrimmed(env, "DATABASE_URL");
  const notifySource = readNotifySource(env);
  const hubCapacity = readPositiveInt(env, "PLAY_HUB_CAPACITY", DEFAULT_HUB_CAPACITY);
  const heartbeatMs = readPositiveInt(env, "PLAY_STREAM_HEARTBEAT_MS", DEFAULT_HEARTBEAT_MS);
  const poolMax = readPositiveInt(env, "PLAY_DB_POOL_MAX", DEFAULT_POOL_MAX);

  if (
    errors.length > 0 ||
    !databaseUrl ||
    !notifySource ||
    hubCapacity === null ||
    heartbeatMs === null ||
    poolMax === null
  ) {
    throw new Error(errors[0] ?? "Play services are not configured.");
  }

  return {
    databaseUrl,
    supabaseUrl: readTrimmed(env, "SUPABASE_URL"),
    supabaseServiceRoleKey: readTrimmed(env, "SUPABASE_SERVICE_ROLE_KEY"),
    notifySource,
    hubCapacity,
    heartbeatMs,
    poolMax,
  };
};
