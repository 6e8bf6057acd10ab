import { describe, expect, it } from "vitest";
import { PlayStreamError } from "./errors";
import { keepEvent, parsePlayEvent, serializePlayEvent, stealEvent } from "./eventLog";

const GAME_ID = "7f1c9a52-3d7e-4b8a-9c1d-2e5f6a7b8c9d";

describe("play event wire shape", () => {
  it("serializes in column order", () => {
    expect(
      serializePlayEvent({
        created_at: "2024-12-24T18:00:00.000Z",
        from_present_id: "4",
        from_player_id: "2",
        present_id: "4",
        player_id: "1",
        game_id: GAME_ID,
        id: "12",
      }),
    ).toBe(
      `{"id":"12","game_id":"${GAME_ID}","player_id":"1","present_id":"4","from_player_id":"2","from_present_id":"4","created_at":"2024-12-24T18:00:00.000Z"}`,
    );
  });

  it("parses a NOTIFY payload with numeric ids and normalizes its timestamp", () => {
    const payload = `{"id":12,"game_id":"${GAME_ID}","player_id":3,"present_id":null,"from_player_id":null,"from_present_id":null,"created_at":"2024-12-24T18:00:00.123456+00:00"}`;

    expect(parsePlayEvent(payload)).toEqual({
      id: "12",
      game_id: GAME_ID,
      player_id: "3",
      present_id: null,
      from_player_id: null,
      from_present_id: null,
      created_at: "2024-12-24T18:00:00.123Z",
    });
  });

  it("parses a realtime record with absent optional columns", () => {
    expect(
      parsePlayEvent({
        id: "13",
        game_id: GAME_ID,
        player_id: "3",
        present_id: 5,
        created_at: "2024-12-24T18:00:01Z",
      }),
    ).toEqual({
      id: "13",
      game_id: GAME_ID,
      player_id: "3",
      present_id: "5",
      from_player_id: null,
      from_present_id: null,
      created_at: "2024-12-24T18:00:01.000Z",
    });
  });

  it("rejects payloads that are not play events", () => {
    expect(() => parsePlayEvent("{not json")).toThrow(
      new PlayStreamError("Play event payload is not valid JSON."),
    );
    expect(() => parsePlayEvent({ id: "1", game_id: "nope" })).toThrow(
      new PlayStreamError("Play event payload does not match the play_events row."),
    );
    expect(() => parsePlayEvent(null)).toThrow(PlayStreamError);
    expect(() =>
      parsePlayEvent({
        id: 1,
        game_id: GAME_ID,
        player_id: 1,
        created_at: "yesterday-ish",
      }),
    ).toThrow(PlayStreamError);
  });

  it("records keeps as their own source and steals against the previous owner", () => {
    expect(keepEvent(GAME_ID, "1", "3")).toEqual({
      game_id: GAME_ID,
      player_id: "1",
      present_id: "3",
      from_player_id: "1",
      from_present_id: "3",
    });
    expect(stealEvent(GAME_ID, "1", "4", "2")).toEqual({
      game_id: GAME_ID,
      player_id: "1",
      present_id: "4",
      from_player_id: "2",
      from_present_id: "4",
    });
  });
});
