import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

const migrationsDir = path.resolve(__dirname, "../../../supabase/migrations");

const migrationSql = readdirSync(migrationsDir)
  .filter((file) => file.endsWith(".sql"))
  .sort()
  .map((file) => readFileSync(path.join(migrationsDir, file), "utf8"))
  .join("\n");

describe("supabase migrations", () => {
  it("adds play_events to the realtime publication only when it is missing", () => {
    const guard = migrationSql.indexOf("from pg_publication_tables");
    const alter = migrationSql.indexOf(
      "alter publication supabase_realtime add table play_events",
    );

    expect(guard).toBeGreaterThan(-1);
    expect(alter).toBeGreaterThan(guard);
    expect(migrationSql.match(/alter publication/g)).toHaveLength(1);
  });

  it("creates every table only if it does not exist", () => {
    const creates = migrationSql.match(/create table [^(]*/g) ?? [];

    expect(creates).toEqual([
      "create table if not exists games ",
      "create table if not exists players ",
      "create table if not exists presents ",
      "create table if not exists play_events ",
    ]);
  });

  it("notifies play_events listeners with the inserted row", () => {
    expect(migrationSql).toContain("pg_notify('play_events', row_to_json(new)::text)");
  });
});
