import { DEBUG } from "@/lib/env";
import { PlayConflictError, PlayNotFoundError } from "./errors";
import {
  keepEvent,
  pickEvent,
  recordPlayEvent,
  rollEvent,
  stealEvent,
} from "./eventLog";
import type { PlayTransaction, SetIfEmptyResult, StateStore, TurnKey } from "./store";
import {
  toSnapshot,
  type GameRow,
  type GameStateSnapshot,
  type PlayCommand,
} from "./types";

const GAME_NOT_FOUND = "Game not found.";
const PRESENT_NOT_FOUND = "Present not found.";

const expectApplied = (
  result: SetIfEmptyResult,
  messages: { occupied: string; noCandidate?: string },
) => {
  switch (result.status) {
    case "applied":
      return result;
    case "occupied":
      throw new PlayConflictError(messages.occupied);
    case "no_candidate":
      throw new PlayNotFoundError(messages.noCandidate ?? GAME_NOT_FOUND);
    case "missing":
      throw new PlayNotFoundError(GAME_NOT_FOUND);
  }
};

const requireGame = async (tx: PlayTransaction, gameId: string) => {
  const game = await tx.getGame(gameId);
  if (!game) {
    throw new PlayNotFoundError(GAME_NOT_FOUND);
  }

  return game;
};

const requireTurn = (game: GameRow): TurnKey => {
  if (!game.player_id || !game.present_id) {
    throw new PlayConflictError("No present is waiting for a decision.");
  }

  return { player_id: game.player_id, present_id: game.present_id };
};

/**
 * The six play actions. Each runs as one store transaction; preconditions are
 * conditional writes, so a lost race surfaces as a conflict and rolls back.
 */
export class TurnEngine {
  constructor(private readonly store: StateStore) {}

  async getState(gameId: string): Promise<GameStateSnapshot> {
    const game = await this.store.getGame(gameId);
    if (!game) {
      throw new PlayNotFoundError(GAME_NOT_FOUND);
    }

    return toSnapshot(game);
  }

  run(gameId: string, command: PlayCommand): Promise<GameStateSnapshot> {
    switch (command.action) {
      case "start":
        return this.start(gameId);
      case "reset":
        return this.reset(gameId);
      case "roll":
        return this.roll(gameId);
      case "keep":
        return this.keep(gameId);
      case "pick":
        return this.pick(gameId, command.presentId);
      case "steal":
        return this.steal(gameId, command.presentId);
    }
  }

  start(gameId: string) {
    return this.store.transaction(async (tx) => {
      const { game } = expectApplied(
        await tx.setIfEmpty(gameId, "started_at", { kind: "now" }),
        { occupied: "Game already started." },
      );

      return toSnapshot(game);
    });
  }

  reset(gameId: string) {
    return this.store.transaction(async (tx) => {
      const game = await tx.clearSession(gameId);
      if (!game) {
        throw new PlayNotFoundError(GAME_NOT_FOUND);
      }

      const released = await tx.clearPresentOwners(gameId);
      const deleted = await tx.deleteEvents(gameId);

      if (DEBUG) {
        console.info("[Play][Engine] reset", { gameId, released, deleted });
      }

      return toSnapshot(game);
    });
  }

  roll(gameId: string) {
    return this.store.transaction(async (tx) => {
      const { game, value: playerId } = expectApplied(
        await tx.setIfEmpty(gameId, "player_id", { kind: "eligible_player" }),
        {
          occupied: "A turn is already in progress.",
          noCandidate: "Every player has already taken a turn.",
        },
      );

      await recordPlayEvent(tx, rollEvent(gameId, playerId));
      return toSnapshot(game);
    });
  }

  pick(gameId: string, presentId: string) {
    return this.store.transaction(async (tx) => {
      const present = await tx.getPresent(gameId, presentId);
      if (!present) {
        throw new PlayNotFoundError(PRESENT_NOT_FOUND);
      }

      if (present.player_id) {
        throw new PlayConflictError("That present has already been claimed.");
      }

      const { game } = expectApplied(
        await tx.setIfEmpty(gameId, "present_id", { kind: "value", value: presentId }),
        { occupied: "Another present is already being decided." },
      );

      // player_id as the conditional write saw it, not as read earlier.
      if (!game.player_id) {
        throw new PlayConflictError("Roll for a player before picking a present.");
      }

      await recordPlayEvent(tx, pickEvent(gameId, game.player_id, presentId));
      return toSnapshot(game);
    });
  }

  keep(gameId: string) {
    return this.store.transaction(async (tx) => {
      const turn = requireTurn(await requireGame(tx, gameId));

      const game = await tx.clearTurn(gameId, turn);
      if (!game) {
        throw new PlayConflictError("This turn has already been resolved.");
      }

      await tx.setPresentOwner(turn.present_id, turn.player_id);
      await recordPlayEvent(
        tx,
        keepEvent(gameId, turn.player_id, turn.present_id),
      );
      return toSnapshot(game);
    });
  }

  steal(gameId: string, targetPresentId: string) {
    return this.store.transaction(async (tx) => {
      const turn = requireTurn(await requireGame(tx, gameId));

      const target = await tx.getPresent(gameId, targetPresentId);
      if (!target) {
        throw new PlayNotFoundError(PRESENT_NOT_FOUND);
      }

      const previousOwnerId = target.player_id;
      if (!previousOwnerId) {
        throw new PlayConflictError("Only a claimed present can be stolen.");
      }

      if (previousOwnerId === turn.player_id) {
        throw new PlayConflictError("The active player already owns that present.");
      }

      const game = await tx.clearTurn(gameId, turn);
      if (!game) {
        throw new PlayConflictError("This turn has already been resolved.");
      }

      await tx.setPresentOwner(target.id, turn.player_id);
      await tx.setPresentOwner(turn.present_id, previousOwnerId);
      await recordPlayEvent(
        tx,
        stealEvent(gameId, turn.player_id, target.id, previousOwnerId),
      );
      return toSnapshot(game);
    });
  }
}
