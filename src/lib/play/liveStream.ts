import { DEBUG } from "@/lib/env";
import type { EventHub, HubSubscription } from "./eventHub";
import { serializePlayEvent } from "./eventLog";
import type { PlayEvent } from "./types";

export const KEEP_ALIVE_TEXT = "It's good to be alive!";

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-cache, no-transform",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

type LiveStreamOptions = {
  hub: EventHub<PlayEvent>;
  /** Only this game's events are forwarded. */
  gameId: string;
  heartbeatMs: number;
  /** Connection lifetime; aborting releases the subscription. */
  signal?: AbortSignal;
};

export const formatEventFrame = (event: PlayEvent) =>
  `id: ${event.id}\ndata: ${serializePlayEvent(event)}\n\n`;

export const formatKeepAliveFrame = (text: string = KEEP_ALIVE_TEXT) =>
  `: ${text}\n\n`;

/**
 * One viewer connection as a Server-Sent Events body. The hub subscription is
 * taken when the stream starts, so only events published from then on are
 * delivered; there is no replay. Frames are produced on pull, one at a time,
 * so a viewer that stops reading leaves its backlog in the hub, where the
 * oldest unread events are dropped.
 */
export const openLiveStream = ({
  hub,
  gameId,
  heartbeatMs,
  signal,
}: LiveStreamOptions): ReadableStream<Uint8Array> => {
  const encoder = new TextEncoder();
  let subscription: HubSubscription<PlayEvent> | null = null;
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  let heartbeat: ReturnType<typeof setInterval> | null = null;
  let finished = false;
  let dropped = 0;

  const release = () => {
    if (heartbeat) {
      clearInterval(heartbeat);
      heartbeat = null;
    }

    subscription?.close();
    signal?.removeEventListener("abort", finish);
  };

  function finish() {
    if (finished) {
      return;
    }

    finished = true;
    release();
    controller?.close();
  }

  return new ReadableStream<Uint8Array>({
    start(streamController) {
      controller = streamController;

      if (signal?.aborted) {
        finish();
        return;
      }

      subscription = hub.subscribe();
      signal?.addEventListener("abort", finish);

      heartbeat = setInterval(() => {
        // Keep-alives never queue up behind a viewer that is not reading.
        if (!finished && (streamController.desiredSize ?? 0) > 0) {
          streamController.enqueue(encoder.encode(formatKeepAliveFrame()));
        }
      }, heartbeatMs);

      if (DEBUG) {
        console.info("[Play][Stream] viewer connected", {
          gameId,
          viewers: hub.subscriberCount,
        });
      }
    },
    async pull(streamController) {
      const current = subscription;
      if (!current) {
        return;
      }

      while (!finished) {
        const event = await current.next();
        if (event === null) {
          finish();
          return;
        }

        if (current.dropped > dropped) {
          console.warn("[Play][Stream] viewer fell behind; events skipped", {
            gameId,
            skipped: current.dropped - dropped,
          });
          dropped = current.dropped;
        }

        if (event.game_id !== gameId || finished) {
          continue;
        }

        streamController.enqueue(encoder.encode(formatEventFrame(event)));
        return;
      }
    },
    cancel() {
      finished = true;
      release();

      if (DEBUG) {
        console.info("[Play][Stream] viewer disconnected", { gameId });
      }
    },
  });
};
