import type { GameRow, NewPlayEvent, PlayEvent, PresentRow } from "./types";

export type GuardedGameField = "player_id" | "present_id" | "started_at";

export type SetIfEmptyValue =
  | { kind: "value"; value: string }
  | { kind: "now" }
  // A random player of the game who owns no present yet, chosen by the same
  // statement that performs the conditional write.
  | { kind: "eligible_player" };

export type SetIfEmptyResult =
  | { status: "applied"; game: GameRow; value: string }
  | { status: "occupied" }
  | { status: "no_candidate" }
  | { status: "missing" };

export type TurnKey = {
  player_id: string;
  present_id: string;
};

/**
 * Operations available inside one store transaction. Everything done through
 * a transaction commits together or not at all.
 */
export type PlayTransaction = {
  getGame(gameId: string): Promise<GameRow | null>;
  getPresent(gameId: string, presentId: string): Promise<PresentRow | null>;
  /**
   * Compare-and-swap on a game column: writes only when the column is
   * currently empty. `occupied` is the zero-rows-affected outcome.
   */
  setIfEmpty(
    gameId: string,
    field: GuardedGameField,
    value: SetIfEmptyValue,
  ): Promise<SetIfEmptyResult>;
  /**
   * Clears `player_id` and `present_id` only while they still hold `turn`.
   * Returns null when another transaction resolved the turn first.
   */
  clearTurn(gameId: string, turn: TurnKey): Promise<GameRow | null>;
  /** Clears turn and `started_at`. Null when the game does not exist. */
  clearSession(gameId: string): Promise<GameRow | null>;
  setPresentOwner(presentId: string, playerId: string | null): Promise<void>;
  clearPresentOwners(gameId: string): Promise<number>;
  appendEvent(event: NewPlayEvent): Promise<PlayEvent>;
  deleteEvents(gameId: string): Promise<number>;
};

export type StateStore = {
  transaction<T>(work: (tx: PlayTransaction) => Promise<T>): Promise<T>;
  getGame(gameId: string): Promise<GameRow | null>;
  ping(): Promise<void>;
};
