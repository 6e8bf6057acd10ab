import { DEBUG } from "@/lib/env";
import { PlayStreamError } from "@/lib/play/errors";
import {
  NotificationQueue,
  PLAY_EVENTS_CHANNEL,
  type NotificationSource,
} from "@/lib/play/notifications";

type ChannelMessage = {
  channel: string;
  payload?: string;
};

/** The slice of a dedicated `pg.Client` that LISTEN needs. */
export type ListenClient = {
  query(text: string): Promise<unknown>;
  on(event: "notification", listener: (message: ChannelMessage) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "end", listener: () => void): unknown;
  end(): Promise<void>;
};

/**
 * LISTEN on the play_events channel over its own connection. Pooled
 * connections are never used here: a LISTEN lasts as long as its session.
 */
export const createListenNotificationSource = (
  connect: () => Promise<ListenClient>,
): NotificationSource => ({
  async listen() {
    const client = await connect();
    let released = false;

    const queue = new NotificationQueue(async () => {
      released = true;
      await client.query(`UNLISTEN ${PLAY_EVENTS_CHANNEL}`).catch((error: unknown) => {
        console.error("[Play][Listen] unlisten failed", error);
      });
      await client.end();
    });

    client.on("notification", (message) => {
      if (message.channel === PLAY_EVENTS_CHANNEL) {
        queue.push(message.payload ?? null);
      }
    });
    client.on("error", (error) => {
      queue.fail(new PlayStreamError("Play event connection failed.", error));
    });
    client.on("end", () => {
      if (!released) {
        queue.fail(new PlayStreamError("Play event connection ended."));
      }
    });

    try {
      await client.query(`LISTEN ${PLAY_EVENTS_CHANNEL}`);
    } catch (error) {
      released = true;
      await client.end().catch((endError: unknown) => {
        console.error("[Play][Listen] unable to close connection", endError);
      });
      throw new PlayStreamError("Unable to listen for play events.", error);
    }

    if (DEBUG) {
      console.info("[Play][Listen] subscribed", { channel: PLAY_EVENTS_CHANNEL });
    }

    return queue;
  },
});
