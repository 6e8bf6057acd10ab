import { Client, Pool } from "pg";
import { getConfigErrors, readPlayConfig, type PlayConfig } from "@/lib/env";
import { TurnEngine } from "@/lib/play/engine";
import type { PlayStreamError } from "@/lib/play/errors";
import { EventHub } from "@/lib/play/eventHub";
import type { NotificationSource } from "@/lib/play/notifications";
import { ChangeNotifier } from "@/lib/play/notifier";
import { PostgresStateStore } from "@/lib/play/postgresStore";
import type { StateStore } from "@/lib/play/store";
import type { PlayEvent } from "@/lib/play/types";
import {
  createRealtimeClient,
  createRealtimeNotificationSource,
} from "@/lib/supabase/realtime";
import { createListenNotificationSource } from "./pgNotifications";

type ClosableStore = StateStore & {
  close?: () => Promise<void>;
};

export type PlayRuntime = {
  config: PlayConfig;
  store: StateStore;
  engine: TurnEngine;
  hub: EventHub<PlayEvent>;
  notifier: ChangeNotifier;
  close(): Promise<void>;
};

type CreatePlayRuntimeOptions = {
  config: PlayConfig;
  store: ClosableStore;
  source: NotificationSource;
  onFatal?: (error: PlayStreamError) => void;
};

/**
 * Wires one engine, hub and notifier around a store. The notifier is not
 * started here; callers decide when live delivery begins.
 */
export const createPlayRuntime = ({
  config,
  store,
  source,
  onFatal,
}: CreatePlayRuntimeOptions): PlayRuntime => {
  const hub = new EventHub<PlayEvent>(config.hubCapacity);
  const notifier = new ChangeNotifier({ source, hub, onFatal });

  return {
    config,
    store,
    engine: new TurnEngine(store),
    hub,
    notifier,
    async close() {
      await notifier.stop();
      hub.close();
      await store.close?.();
    },
  };
};

const createNotificationSource = (config: PlayConfig): NotificationSource => {
  if (config.notifySource === "listen") {
    return createListenNotificationSource(async () => {
      const client = new Client({ connectionString: config.databaseUrl });
      await client.connect();
      return client;
    });
  }

  if (!config.supabaseUrl || !config.supabaseServiceRoleKey) {
    throw new Error("Supabase Realtime is not configured.");
  }

  return createRealtimeNotificationSource(
    createRealtimeClient(config.supabaseUrl, config.supabaseServiceRoleKey),
  );
};

export type PlayRuntimeLookup =
  | { ok: true; runtime: PlayRuntime }
  | { ok: false; error: string };

let sharedRuntime: PlayRuntime | null = null;

/** The process-wide runtime, built and started on first use. */
export const getPlayRuntime = (): PlayRuntimeLookup => {
  if (sharedRuntime) {
    return { ok: true, runtime: sharedRuntime };
  }

  const errors = getConfigErrors();
  if (errors.length > 0) {
    return { ok: false, error: errors[0] };
  }

  const config = readPlayConfig();
  const pool = new Pool({ connectionString: config.databaseUrl, max: config.poolMax });
  pool.on("error", (error) => {
    console.error("[Play][Store] idle client error", error);
  });

  const runtime = createPlayRuntime({
    config,
    store: new PostgresStateStore(pool),
    source: createNotificationSource(config),
  });

  // A failed start leaves the notifier in `failed`; the health probe reports it.
  void runtime.notifier.start().catch((error: unknown) => {
    console.error("[Play][Runtime] notifier did not start", error);
  });

  sharedRuntime = runtime;
  return { ok: true, runtime };
};
