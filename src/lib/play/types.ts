/**
 * DB Source of Truth: /supabase/migrations
 *
 * Player and present ids are BIGSERIAL columns. They travel as decimal
 * strings, which is also how `pg` returns int8 values.
 */

export type GameRow = {
  id: string;
  // Owned by the authorization layer; read-only here.
  users: Record<string, number>;
  player_id: string | null;
  present_id: string | null;
  started_at: string | null;
  created_at: string;
  updated_at: string | null;
};

export type PlayerRow = {
  id: string;
  game_id: string;
};

export type PresentRow = {
  id: string;
  game_id: string;
  player_id: string | null;
};

export type PlayEvent = {
  id: string;
  game_id: string;
  player_id: string;
  present_id: string | null;
  from_player_id: string | null;
  from_present_id: string | null;
  created_at: string;
};

export type NewPlayEvent = Omit<PlayEvent, "id" | "created_at">;

export type GameStateSnapshot = {
  player_id: string | null;
  present_id: string | null;
  started_at: string | null;
  updated_at: string;
};

export const PLAY_ACTIONS = [
  "start",
  "reset",
  "roll",
  "pick",
  "keep",
  "steal",
] as const;

export type PlayAction = (typeof PLAY_ACTIONS)[number];

export type PlayCommand =
  | { action: "start" | "reset" | "roll" | "keep" }
  | { action: "pick" | "steal"; presentId: string };

export const isPlayAction = (value: string): value is PlayAction =>
  PLAY_ACTIONS.some((action) => action === value);

export const toSnapshot = (game: GameRow): GameStateSnapshot => ({
  player_id: game.player_id,
  present_id: game.present_id,
  started_at: game.started_at,
  updated_at: game.updated_at ?? game.created_at,
});
