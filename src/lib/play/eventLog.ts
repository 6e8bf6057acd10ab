import { PlayStreamError } from "./errors";
import { playEventSchema } from "./schema";
import type { PlayTransaction } from "./store";
import type { NewPlayEvent, PlayEvent } from "./types";

export const rollEvent = (gameId: string, playerId: string): NewPlayEvent => ({
  game_id: gameId,
  player_id: playerId,
  present_id: null,
  from_player_id: null,
  from_present_id: null,
});

export const pickEvent = (
  gameId: string,
  playerId: string,
  presentId: string,
): NewPlayEvent => ({
  game_id: gameId,
  player_id: playerId,
  present_id: presentId,
  from_player_id: null,
  from_present_id: null,
});

// A keep records itself as its own source: from_* repeat player_id/present_id.
export const keepEvent = (
  gameId: string,
  playerId: string,
  presentId: string,
): NewPlayEvent => ({
  game_id: gameId,
  player_id: playerId,
  present_id: presentId,
  from_player_id: playerId,
  from_present_id: presentId,
});

export const stealEvent = (
  gameId: string,
  playerId: string,
  targetPresentId: string,
  previousOwnerId: string,
): NewPlayEvent => ({
  game_id: gameId,
  player_id: playerId,
  present_id: targetPresentId,
  from_player_id: previousOwnerId,
  from_present_id: targetPresentId,
});

/**
 * Appends inside the caller's transaction, so the row (and the store
 * notification it triggers) only becomes visible once that transaction commits.
 */
export const recordPlayEvent = (
  tx: PlayTransaction,
  event: NewPlayEvent,
): Promise<PlayEvent> => tx.appendEvent(event);

export const serializePlayEvent = (event: PlayEvent) =>
  JSON.stringify({
    id: event.id,
    game_id: event.game_id,
    player_id: event.player_id,
    present_id: event.present_id,
    from_player_id: event.from_player_id,
    from_present_id: event.from_present_id,
    created_at: event.created_at,
  });

const decodePayload = (payload: unknown): unknown => {
  if (typeof payload !== "string") {
    return payload;
  }

  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new PlayStreamError("Play event payload is not valid JSON.", error);
  }
};

/** Accepts a NOTIFY text payload or a Realtime record. */
export const parsePlayEvent = (payload: unknown): PlayEvent => {
  const parsed = playEventSchema.safeParse(decodePayload(payload));
  if (!parsed.success) {
    throw new PlayStreamError(
      "Play event payload does not match the play_events row.",
      parsed.error,
    );
  }

  return parsed.data;
};
