import { REALTIME_SUBSCRIBE_STATES, createClient } from "@supabase/supabase-js";
import WebSocket from "ws";
import { DEBUG } from "@/lib/env";
import { PlayStreamError } from "@/lib/play/errors";
import {
  NotificationQueue,
  PLAY_EVENTS_CHANNEL,
  type NotificationSource,
} from "@/lib/play/notifications";

/** Server-side client: no session persistence, Node WebSocket transport. */
export const createRealtimeClient = (supabaseUrl: string, serviceRoleKey: string) =>
  createClient(supabaseUrl, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    realtime: {
      transport: WebSocket,
    },
  });

type InsertFilter = {
  event: "INSERT";
  schema: string;
  table: string;
};

/** The slice of a Supabase `RealtimeChannel` the source uses. */
export type RealtimeChannelLike = {
  on(
    type: "postgres_changes",
    filter: InsertFilter,
    callback: (payload: { new: unknown }) => void,
  ): RealtimeChannelLike;
  subscribe(
    callback: (status: REALTIME_SUBSCRIBE_STATES, error?: Error) => void,
  ): unknown;
};

export type RealtimeChannelClient<C extends RealtimeChannelLike> = {
  channel(name: string): C;
  removeChannel(channel: C): Promise<string>;
};

/**
 * Committed play_events inserts delivered through Supabase Realtime. The
 * table's membership in the supabase_realtime publication is what makes the
 * rows arrive here.
 *
 * CHANNEL_ERROR and TIMED_OUT after the first join are left to the client,
 * which rejoins on its own and reports SUBSCRIBED again. Only a CLOSED channel
 * that nobody released ends the stream.
 */
export const createRealtimeNotificationSource = <C extends RealtimeChannelLike>(
  client: RealtimeChannelClient<C>,
): NotificationSource => ({
  listen() {
    return new Promise((resolve, reject) => {
      let subscribed = false;
      let released = false;

      const channel = client.channel(`play-runtime:${PLAY_EVENTS_CHANNEL}`);

      const queue = new NotificationQueue(async () => {
        released = true;
        const outcome = await client.removeChannel(channel);
        if (outcome !== "ok") {
          console.error("[Play][Realtime] channel removal did not complete", {
            outcome,
          });
        }
      });

      channel
        .on(
          "postgres_changes",
          { event: "INSERT", schema: "public", table: PLAY_EVENTS_CHANNEL },
          (payload) => {
            queue.push(payload.new);
          },
        )
        .subscribe((status, error) => {
          if (released) {
            return;
          }

          if (status === REALTIME_SUBSCRIBE_STATES.SUBSCRIBED) {
            if (DEBUG) {
              console.info("[Play][Realtime] subscribed", {
                table: PLAY_EVENTS_CHANNEL,
                rejoined: subscribed,
              });
            }
            if (!subscribed) {
              subscribed = true;
              resolve(queue);
            }
            return;
          }

          const failure = new PlayStreamError(
            `Play event channel reported ${status}.`,
            error,
          );

          if (!subscribed) {
            released = true;
            void client.removeChannel(channel).catch((removeError: unknown) => {
              console.error("[Play][Realtime] unable to remove channel", removeError);
            });
            reject(failure);
            return;
          }

          if (status === REALTIME_SUBSCRIBE_STATES.CLOSED) {
            queue.fail(failure);
            return;
          }

          console.warn("[Play][Realtime] channel interrupted; waiting for rejoin", {
            status,
            error: error?.message,
          });
        });
    });
  },
});
