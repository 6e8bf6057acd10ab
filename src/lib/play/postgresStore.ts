import { isPlayError, PlayNotFoundError, PlayStorageError } from "./errors";
import { gameRowSchema, playEventSchema, presentRowSchema } from "./schema";
import type {
  GuardedGameField,
  PlayTransaction,
  SetIfEmptyResult,
  SetIfEmptyValue,
  StateStore,
  TurnKey,
} from "./store";
import type { GameRow, NewPlayEvent } from "./types";

type QueryResultLike = {
  rows: unknown[];
  rowCount: number | null;
};

/** The slice of `pg.PoolClient` the store uses. */
export type PgClient = {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  release(): void;
};

/** The slice of `pg.Pool` the store uses. */
export type PgPool = {
  connect(): Promise<PgClient>;
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  end(): Promise<void>;
};

const GAME_COLUMNS =
  "id, users, player_id, present_id, started_at, created_at, updated_at";

const PLAY_EVENT_COLUMNS =
  "id, game_id, player_id, present_id, from_player_id, from_present_id, created_at";

// Identifiers are never interpolated from input; only these literals are.
const GUARDED_COLUMNS: Record<GuardedGameField, string> = {
  player_id: "player_id",
  present_id: "present_id",
  started_at: "started_at",
};

const ELIGIBLE_PLAYER_SQL = `(
  SELECT players.id
  FROM players
  WHERE players.game_id = $1
    AND NOT EXISTS (
      SELECT 1
      FROM presents
      WHERE presents.game_id = $1
        AND presents.player_id = players.id
    )
  ORDER BY random()
  LIMIT 1
)`;

const parseGame = (row: unknown): GameRow => gameRowSchema.parse(row);

const firstGame = (result: QueryResultLike) =>
  result.rows.length > 0 ? parseGame(result.rows[0]) : null;

class PostgresTransaction implements PlayTransaction {
  constructor(private readonly client: PgClient) {}

  async getGame(gameId: string) {
    return firstGame(
      await this.client.query(`SELECT ${GAME_COLUMNS} FROM games WHERE id = $1`, [
        gameId,
      ]),
    );
  }

  async getPresent(gameId: string, presentId: string) {
    const result = await this.client.query(
      "SELECT id, game_id, player_id FROM presents WHERE id = $1 AND game_id = $2",
      [presentId, gameId],
    );
    return result.rows.length > 0 ? presentRowSchema.parse(result.rows[0]) : null;
  }

  async setIfEmpty(
    gameId: string,
    field: GuardedGameField,
    value: SetIfEmptyValue,
  ): Promise<SetIfEmptyResult> {
    const column = GUARDED_COLUMNS[field];
    const values: unknown[] = [gameId];
    let expression: string;

    switch (value.kind) {
      case "value":
        values.push(value.value);
        expression = "$2";
        break;
      case "now":
        expression = "NOW()";
        break;
      case "eligible_player":
        expression = ELIGIBLE_PLAYER_SQL;
        break;
    }

    // One statement: a concurrent writer that got there first leaves this one
    // with zero rows once its transaction commits.
    const game = firstGame(
      await this.client.query(
        `UPDATE games
         SET ${column} = ${expression}, updated_at = NOW()
         WHERE id = $1 AND ${column} IS NULL
         RETURNING ${GAME_COLUMNS}`,
        values,
      ),
    );

    if (!game) {
      const exists = await this.client.query("SELECT 1 FROM games WHERE id = $1", [
        gameId,
      ]);
      return exists.rows.length > 0 ? { status: "occupied" } : { status: "missing" };
    }

    const applied = game[field];
    if (applied === null) {
      return { status: "no_candidate" };
    }

    return { status: "applied", game, value: applied };
  }

  async clearTurn(gameId: string, turn: TurnKey) {
    return firstGame(
      await this.client.query(
        `UPDATE games
         SET player_id = NULL, present_id = NULL, updated_at = NOW()
         WHERE id = $1 AND player_id = $2 AND present_id = $3
         RETURNING ${GAME_COLUMNS}`,
        [gameId, turn.player_id, turn.present_id],
      ),
    );
  }

  async clearSession(gameId: string) {
    return firstGame(
      await this.client.query(
        `UPDATE games
         SET started_at = NULL, player_id = NULL, present_id = NULL, updated_at = NOW()
         WHERE id = $1
         RETURNING ${GAME_COLUMNS}`,
        [gameId],
      ),
    );
  }

  async setPresentOwner(presentId: string, playerId: string | null) {
    const result = await this.client.query(
      "UPDATE presents SET player_id = $2, updated_at = NOW() WHERE id = $1",
      [presentId, playerId],
    );
    if (result.rowCount === 0) {
      throw new PlayNotFoundError("Present not found.");
    }
  }

  async clearPresentOwners(gameId: string) {
    const result = await this.client.query(
      `UPDATE presents
       SET player_id = NULL, updated_at = NOW()
       WHERE game_id = $1 AND player_id IS NOT NULL`,
      [gameId],
    );
    return result.rowCount ?? 0;
  }

  async appendEvent(event: NewPlayEvent) {
    const result = await this.client.query(
      `INSERT INTO play_events (game_id, player_id, present_id, from_player_id, from_present_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PLAY_EVENT_COLUMNS}`,
      [
        event.game_id,
        event.player_id,
        event.present_id,
        event.from_player_id,
        event.from_present_id,
      ],
    );
    return playEventSchema.parse(result.rows[0]);
  }

  async deleteEvents(gameId: string) {
    const result = await this.client.query(
      "DELETE FROM play_events WHERE game_id = $1",
      [gameId],
    );
    return result.rowCount ?? 0;
  }
}

/**
 * Game state in Postgres. Each transaction holds one pooled connection from
 * BEGIN to COMMIT; any error rolls everything back. Driver errors surface as
 * PlayStorageError, play errors raised by the work pass through untouched.
 */
export class PostgresStateStore implements StateStore {
  constructor(private readonly pool: PgPool) {}

  async transaction<T>(work: (tx: PlayTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect().catch((error: unknown) => {
      throw new PlayStorageError("Unable to reach the game store.", error);
    });

    try {
      await client.query("BEGIN");
      const result = await work(new PostgresTransaction(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        console.error("[Play][Store] rollback failed", rollbackError);
      });
      throw isPlayError(error)
        ? error
        : new PlayStorageError("Unable to update game state.", error);
    } finally {
      client.release();
    }
  }

  async getGame(gameId: string) {
    try {
      return firstGame(
        await this.pool.query(`SELECT ${GAME_COLUMNS} FROM games WHERE id = $1`, [
          gameId,
        ]),
      );
    } catch (error) {
      throw new PlayStorageError("Unable to read game state.", error);
    }
  }

  async ping() {
    await this.pool.query("SELECT 1");
  }

  close() {
    return this.pool.end();
  }
}
