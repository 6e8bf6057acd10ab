import { NotificationQueue, type NotificationSource } from "./notifications";
import { PlayNotFoundError } from "./errors";
import { serializePlayEvent } from "./eventLog";
import type {
  GuardedGameField,
  PlayTransaction,
  SetIfEmptyResult,
  SetIfEmptyValue,
  StateStore,
  TurnKey,
} from "./store";
import type {
  GameRow,
  NewPlayEvent,
  PlayEvent,
  PlayerRow,
  PresentRow,
} from "./types";

type MemoryTables = {
  games: Map<string, GameRow>;
  players: Map<string, PlayerRow>;
  presents: Map<string, PresentRow>;
  events: PlayEvent[];
  nextRowId: number;
};

type MemoryStoreOptions = {
  now?: () => Date;
  random?: () => number;
};

const emptyTables = (): MemoryTables => ({
  games: new Map(),
  players: new Map(),
  presents: new Map(),
  events: [],
  nextRowId: 1,
});

class MemoryTransaction implements PlayTransaction {
  readonly appended: PlayEvent[] = [];

  constructor(
    private readonly tables: MemoryTables,
    private readonly now: () => string,
    private readonly random: () => number,
  ) {}

  async getGame(gameId: string) {
    const game = this.tables.games.get(gameId);
    return game ? { ...game } : null;
  }

  async getPresent(gameId: string, presentId: string) {
    const present = this.tables.presents.get(presentId);
    return present && present.game_id === gameId ? { ...present } : null;
  }

  async setIfEmpty(
    gameId: string,
    field: GuardedGameField,
    value: SetIfEmptyValue,
  ): Promise<SetIfEmptyResult> {
    const game = this.tables.games.get(gameId);
    if (!game) {
      return { status: "missing" };
    }

    if (game[field] !== null) {
      return { status: "occupied" };
    }

    const resolved = this.resolve(gameId, value);
    if (resolved === null) {
      return { status: "no_candidate" };
    }

    game[field] = resolved;
    game.updated_at = this.now();
    return { status: "applied", game: { ...game }, value: resolved };
  }

  async clearTurn(gameId: string, turn: TurnKey) {
    const game = this.tables.games.get(gameId);
    if (
      !game ||
      game.player_id !== turn.player_id ||
      game.present_id !== turn.present_id
    ) {
      return null;
    }

    game.player_id = null;
    game.present_id = null;
    game.updated_at = this.now();
    return { ...game };
  }

  async clearSession(gameId: string) {
    const game = this.tables.games.get(gameId);
    if (!game) {
      return null;
    }

    game.player_id = null;
    game.present_id = null;
    game.started_at = null;
    game.updated_at = this.now();
    return { ...game };
  }

  async setPresentOwner(presentId: string, playerId: string | null) {
    const present = this.tables.presents.get(presentId);
    if (!present) {
      throw new PlayNotFoundError("Present not found.");
    }

    present.player_id = playerId;
  }

  async clearPresentOwners(gameId: string) {
    let released = 0;
    for (const present of this.tables.presents.values()) {
      if (present.game_id === gameId && present.player_id !== null) {
        present.player_id = null;
        released += 1;
      }
    }

    return released;
  }

  async appendEvent(event: NewPlayEvent) {
    const row: PlayEvent = {
      ...event,
      id: String(this.tables.nextRowId++),
      created_at: this.now(),
    };
    this.tables.events.push(row);
    this.appended.push(row);
    return { ...row };
  }

  async deleteEvents(gameId: string) {
    const before = this.tables.events.length;
    this.tables.events = this.tables.events.filter(
      (event) => event.game_id !== gameId,
    );
    return before - this.tables.events.length;
  }

  private resolve(gameId: string, value: SetIfEmptyValue) {
    switch (value.kind) {
      case "value":
        return value.value;
      case "now":
        return this.now();
      case "eligible_player": {
        const owners = new Set<string>();
        for (const present of this.tables.presents.values()) {
          if (present.game_id === gameId && present.player_id !== null) {
            owners.add(present.player_id);
          }
        }

        const eligible = [...this.tables.players.values()].filter(
          (player) => player.game_id === gameId && !owners.has(player.id),
        );
        if (eligible.length === 0) {
          return null;
        }

        const index = Math.min(
          Math.floor(this.random() * eligible.length),
          eligible.length - 1,
        );
        return eligible[index].id;
      }
    }
  }
}

/**
 * In-process store for tests and local runs. Transactions run one at a time
 * against a copy of the tables, which replaces the committed tables only when
 * the work resolves. Committed play events are announced to listeners as
 * `row_to_json` style text, like the database trigger does.
 */
export class MemoryStateStore implements StateStore, NotificationSource {
  private tables: MemoryTables = emptyTables();
  private queue: Promise<void> = Promise.resolve();
  private readonly listeners = new Set<NotificationQueue>();
  private readonly now: () => string;
  private readonly random: () => number;

  constructor(options: MemoryStoreOptions = {}) {
    const now = options.now ?? (() => new Date());
    this.now = () => now().toISOString();
    this.random = options.random ?? Math.random;
  }

  transaction<T>(work: (tx: PlayTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async getGame(gameId: string) {
    const game = this.tables.games.get(gameId);
    return game ? { ...game } : null;
  }

  async ping() {}

  async listen() {
    const queue = new NotificationQueue(() => {
      this.listeners.delete(queue);
    });
    this.listeners.add(queue);
    return queue;
  }

  addGame(id: string, users: Record<string, number> = {}): GameRow {
    const game: GameRow = {
      id,
      users,
      player_id: null,
      present_id: null,
      started_at: null,
      created_at: this.now(),
      updated_at: null,
    };
    this.tables.games.set(id, game);
    return { ...game };
  }

  addPlayer(gameId: string): PlayerRow {
    const player = { id: String(this.tables.nextRowId++), game_id: gameId };
    this.tables.players.set(player.id, player);
    return { ...player };
  }

  addPresent(gameId: string, playerId: string | null = null): PresentRow {
    const present = {
      id: String(this.tables.nextRowId++),
      game_id: gameId,
      player_id: playerId,
    };
    this.tables.presents.set(present.id, present);
    return { ...present };
  }

  getPresent(presentId: string): PresentRow | null {
    const present = this.tables.presents.get(presentId);
    return present ? { ...present } : null;
  }

  listEvents(gameId: string): PlayEvent[] {
    return this.tables.events
      .filter((event) => event.game_id === gameId)
      .map((event) => ({ ...event }));
  }

  private async runTransaction<T>(work: (tx: PlayTransaction) => Promise<T>) {
    const draft = structuredClone(this.tables);
    const tx = new MemoryTransaction(draft, this.now, this.random);
    const result = await work(tx);

    this.tables = draft;
    for (const event of tx.appended) {
      for (const listener of this.listeners) {
        listener.push(serializePlayEvent(event));
      }
    }

    return result;
  }
}
