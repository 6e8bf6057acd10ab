import { DEBUG } from "@/lib/env";
import { PlayStreamError } from "./errors";
import type { EventHub } from "./eventHub";
import { parsePlayEvent } from "./eventLog";
import type { NotificationSource, NotificationStream } from "./notifications";
import type { PlayEvent } from "./types";

export type NotifierStatus = "idle" | "running" | "stopped" | "failed";

type ChangeNotifierOptions = {
  source: NotificationSource;
  hub: EventHub<PlayEvent>;
  /** Raised once if the channel dies; live delivery is gone until restart. */
  onFatal?: (error: PlayStreamError) => void;
};

const toStreamError = (error: unknown, message: string) =>
  error instanceof PlayStreamError ? error : new PlayStreamError(message, error);

/**
 * The single listener that republishes committed play events from the
 * store's notification channel into the process-local hub.
 */
export class ChangeNotifier {
  private readonly source: NotificationSource;
  private readonly hub: EventHub<PlayEvent>;
  private readonly onFatal?: (error: PlayStreamError) => void;
  private currentStatus: NotifierStatus = "idle";
  private stream: NotificationStream | null = null;
  private loop: Promise<void> = Promise.resolve();
  private stopRequested = false;
  private lastFailure: PlayStreamError | null = null;
  private received = 0;
  private rejected = 0;

  constructor(options: ChangeNotifierOptions) {
    this.source = options.source;
    this.hub = options.hub;
    this.onFatal = options.onFatal;
  }

  get status() {
    return this.currentStatus;
  }

  get failure() {
    return this.lastFailure;
  }

  get stats() {
    return { received: this.received, rejected: this.rejected };
  }

  /** Settles once the listen loop has exited, whatever the reason. */
  get done() {
    return this.loop;
  }

  async start() {
    if (this.currentStatus !== "idle") {
      throw new Error(`Change notifier cannot start from ${this.currentStatus}.`);
    }

    let stream: NotificationStream;
    try {
      stream = await this.source.listen();
    } catch (error) {
      const failure = toStreamError(error, "Unable to listen for play events.");
      this.fail(failure);
      throw failure;
    }

    if (this.stopRequested) {
      await stream.close();
      return;
    }

    this.stream = stream;
    this.currentStatus = "running";
    this.loop = this.consume(stream);

    if (DEBUG) {
      console.info("[Play][Notifier] listening");
    }
  }

  async stop() {
    this.stopRequested = true;
    if (this.currentStatus === "idle") {
      this.currentStatus = "stopped";
    }

    if (this.stream) {
      await this.stream.close();
    }

    await this.loop;
  }

  private async consume(stream: NotificationStream) {
    let failure: PlayStreamError | null = null;
    try {
      for await (const payload of stream) {
        this.forward(payload);
      }
    } catch (error) {
      failure = toStreamError(error, "Play event channel failed.");
    }

    if (this.stopRequested) {
      this.currentStatus = "stopped";
      if (DEBUG) {
        console.info("[Play][Notifier] stopped", this.stats);
      }
      return;
    }

    this.fail(failure ?? new PlayStreamError("Play event channel closed."));

    // A failed channel must not stay registered with its source.
    await stream.close().catch((error: unknown) => {
      console.error("[Play][Notifier] unable to release the channel", error);
    });
  }

  private forward(payload: unknown) {
    this.received += 1;

    let event: PlayEvent;
    try {
      event = parsePlayEvent(payload);
    } catch (error) {
      this.rejected += 1;
      console.error("[Play][Notifier] dropped malformed payload", {
        error: error instanceof Error ? error.message : error,
      });
      return;
    }

    const subscribers = this.hub.publish(event);
    if (DEBUG) {
      console.info("[Play][Notifier] published", {
        eventId: event.id,
        gameId: event.game_id,
        subscribers,
      });
    }
  }

  private fail(error: PlayStreamError) {
    this.currentStatus = "failed";
    this.lastFailure = error;
    console.error("[Play][Notifier] listener stopped; live updates are down", error);
    this.onFatal?.(error);
  }
}
