import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SEED_TODOS } from "../../core/seed";
import { openDatabase, type DatabaseHandle } from "../database/connection";
import SqliteTodoRepository from "./sqliteTodoRepository";

const START = Date.UTC(2024, 5, 1, 12, 0, 0);

describe("SqliteTodoRepository", () => {
  let handle: DatabaseHandle;
  let repo: SqliteTodoRepository;
  let ticks: number;

  beforeEach(() => {
    ticks = 0;
    handle = openDatabase(":memory:");
    repo = new SqliteTodoRepository(handle.db, () => new Date(START + ++ticks * 1000));
  });

  afterEach(() => {
    handle.close();
  });

  it("inserts and reads back a todo", async () => {
    const created = await repo.create({ title: "Buy milk" });

    expect(created).toEqual({
      id: 1,
      title: "Buy milk",
      description: "",
      completed: false,
      createdAt: new Date(START + 1000),
      updatedAt: new Date(START + 1000),
    });
    expect(await repo.getById(1)).toEqual(created);
    expect(await repo.getById(2)).toBeNull();
  });

  it("never reuses the id of a deleted row", async () => {
    await repo.create({ title: "a" });
    const b = await repo.create({ title: "b" });
    expect(await repo.delete(b.id)).toBe(true);

    const c = await repo.create({ title: "c" });

    expect(c.id).toBe(3);
    expect(await repo.delete(b.id)).toBe(false);
  });

  it("filters by status in id order", async () => {
    await repo.create({ title: "a" });
    await repo.create({ title: "b", completed: true });
    await repo.create({ title: "c" });
    await repo.create({ title: "d", completed: true });

    expect((await repo.list()).map(t => t.title)).toEqual(["a", "b", "c", "d"]);
    expect((await repo.list("completed")).map(t => t.title)).toEqual(["b", "d"]);
    expect((await repo.list("pending")).map(t => t.title)).toEqual(["a", "c"]);
  });

  it("applies a partial update", async () => {
    const created = await repo.create({ title: "Plan trip", description: "Lisbon" });

    const updated = await repo.update(created.id, { description: "Porto" });

    expect(updated).toEqual({
      ...created,
      description: "Porto",
      updatedAt: new Date(START + 2000),
    });
    expect(await repo.update(42, { title: "nope" })).toBeNull();
  });

  it("toggles completed in place", async () => {
    const created = await repo.create({ title: "Water plants" });

    const once = await repo.toggle(created.id);
    const twice = await repo.toggle(created.id);

    expect(once?.completed).toBe(true);
    expect(once?.updatedAt).toEqual(new Date(START + 2000));
    expect(twice?.completed).toBe(false);
    expect(twice?.updatedAt).toEqual(new Date(START + 3000));
    expect(await repo.toggle(999)).toBeNull();
  });

  it("aggregates stats", async () => {
    expect(await repo.stats()).toEqual({ total: 0, completed: 0, pending: 0, completionRate: 0 });

    await repo.create({ title: "a", completed: true });
    await repo.create({ title: "b" });
    await repo.create({ title: "c" });
    await repo.create({ title: "d" });

    expect(await repo.stats()).toEqual({ total: 4, completed: 1, pending: 3, completionRate: 25 });
  });

  it("reset restores the seed set", async () => {
    await repo.create({ title: "x" });
    await repo.create({ title: "y", completed: true });

    const seeded = await repo.reset();

    expect(seeded.map(t => [t.title, t.description, t.completed])).toEqual(
      SEED_TODOS.map(s => [s.title, s.description, false])
    );
    expect(await repo.list()).toEqual(seeded);
  });

  it("keeps handing out fresh ids after a reset", async () => {
    const before: number[] = [];
    for (const title of ["a", "b", "c", "d", "e"]) {
      before.push((await repo.create({ title })).id);
    }

    const seeded = await repo.reset();
    const next = await repo.create({ title: "after reset" });

    const highestBefore = Math.max(...before);
    expect(seeded.every(t => t.id > highestBefore)).toBe(true);
    expect(next.id).toBeGreaterThan(Math.max(...seeded.map(t => t.id)));
  });

  it("never moves updatedAt before createdAt when the clock steps back", async () => {
    const times = [START, START - 5000, START - 9000];
    const backwards = new SqliteTodoRepository(handle.db, () => new Date(times.shift() ?? START - 60000));

    const created = await backwards.create({ title: "Check the clock" });
    const toggled = await backwards.toggle(created.id);
    const updated = await backwards.update(created.id, { title: "Check it again" });

    expect(toggled?.updatedAt).toEqual(created.createdAt);
    expect(updated?.updatedAt).toEqual(created.createdAt);
    expect(updated?.createdAt).toEqual(new Date(START));
  });

  it("seeds only an empty table", async () => {
    expect(await repo.seedIfEmpty()).toBe(SEED_TODOS.length);
    expect(await repo.seedIfEmpty()).toBe(0);
    expect((await repo.list()).length).toBe(SEED_TODOS.length);
  });
});
