import { NextResponse } from "next/server";
import { DEBUG } from "@/lib/env";
import type { TurnEngine } from "@/lib/play/engine";
import { isPlayError } from "@/lib/play/errors";
import { openLiveStream, SSE_HEADERS } from "@/lib/play/liveStream";
import { gameIdSchema, presentRequestSchema } from "@/lib/play/schema";
import { isPlayAction, type PlayCommand } from "@/lib/play/types";
import type { PlayRuntime } from "./runtime";

const STORAGE_FAILURE = "Unable to update game state.";

const errorResponse = (status: number, error: string) =>
  NextResponse.json({ error }, { status });

export const notConfiguredResponse = (error: string) => errorResponse(503, error);

const toErrorResponse = (error: unknown, context: Record<string, unknown>) => {
  if (isPlayError(error)) {
    switch (error.code) {
      case "conflict":
        return errorResponse(409, error.message);
      case "not_found":
        return errorResponse(404, error.message);
      case "storage":
      case "stream":
        break;
    }
  }

  console.error("[Play][Route] action failed", { ...context, error });
  return errorResponse(500, STORAGE_FAILURE);
};

const parseGameId = (gameId: string) => {
  const parsed = gameIdSchema.safeParse(gameId);
  return parsed.success ? parsed.data : null;
};

const readCommand = async (
  request: Request,
): Promise<{ command: PlayCommand } | { error: string }> => {
  const action = new URL(request.url).searchParams.get("action");
  if (!action || !isPlayAction(action)) {
    return { error: "Unknown action." };
  }

  if (action !== "pick" && action !== "steal") {
    return { command: { action } };
  }

  const body: unknown = await request.json().catch(() => null);
  const parsed = presentRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { error: "present_id is required." };
  }

  return { command: { action, presentId: parsed.data.present_id } };
};

export const handleGetState = async (engine: TurnEngine, rawGameId: string) => {
  const gameId = parseGameId(rawGameId);
  if (!gameId) {
    return errorResponse(400, "Invalid game id.");
  }

  try {
    return NextResponse.json(await engine.getState(gameId));
  } catch (error) {
    return toErrorResponse(error, { gameId, action: "state" });
  }
};

export const handlePlayAction = async (
  engine: TurnEngine,
  request: Request,
  rawGameId: string,
) => {
  const gameId = parseGameId(rawGameId);
  if (!gameId) {
    return errorResponse(400, "Invalid game id.");
  }

  const read = await readCommand(request);
  if ("error" in read) {
    return errorResponse(400, read.error);
  }

  try {
    const snapshot = await engine.run(gameId, read.command);
    if (DEBUG) {
      console.info("[Play][Route] action applied", {
        gameId,
        action: read.command.action,
      });
    }
    return NextResponse.json(snapshot);
  } catch (error) {
    return toErrorResponse(error, { gameId, action: read.command.action });
  }
};

export const handleStream = async (
  runtime: Pick<PlayRuntime, "engine" | "hub" | "config">,
  request: Request,
  rawGameId: string,
) => {
  const gameId = parseGameId(rawGameId);
  if (!gameId) {
    return errorResponse(400, "Invalid game id.");
  }

  try {
    await runtime.engine.getState(gameId);
  } catch (error) {
    return toErrorResponse(error, { gameId, action: "stream" });
  }

  const body = openLiveStream({
    hub: runtime.hub,
    gameId,
    heartbeatMs: runtime.config.heartbeatMs,
    signal: request.signal,
  });

  return new NextResponse(body, { headers: SSE_HEADERS });
};

export const handleHealth = async (runtime: Pick<PlayRuntime, "store" | "notifier">) => {
  let database: "ok" | "error" = "ok";
  try {
    await runtime.store.ping();
  } catch (error) {
    database = "error";
    console.error("[Play][Health] database check failed", error);
  }

  const notifier = runtime.notifier.status;
  const healthy = database === "ok" && notifier === "running";

  return NextResponse.json(
    { status: healthy ? "ok" : "error", database, notifier },
    { status: healthy ? 200 : 503 },
  );
};
