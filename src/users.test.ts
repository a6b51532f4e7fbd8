import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import { UserStore } from "./users";

describe("UserStore", () => {
  let store: UserStore;

  beforeEach(() => {
    store = new UserStore(new Database(":memory:"));
  });

  it("returns defaults for unknown users", () => {
    expect(store.get("slack:U1")).toEqual({ userId: "slack:U1", enabled: false, filter: null, filterEnabled: false });
  });

  it("enables and disables notifications", () => {
    store.setEnabled("slack:U1", true);
    expect(store.get("slack:U1").enabled).toBe(true);
    store.setEnabled("slack:U1", false);
    expect(store.get("slack:U1").enabled).toBe(false);
  });

  it("turns a new filter on and keeps it when toggled", () => {
    store.setFilter("slack:U1", "WIP");
    expect(store.get("slack:U1")).toMatchObject({ filter: "WIP", filterEnabled: true });

    store.setFilterEnabled("slack:U1", false);
    expect(store.get("slack:U1")).toMatchObject({ filter: "WIP", filterEnabled: false });
  });

  it("keeps the enabled flag when the filter changes", () => {
    store.setEnabled("slack:U1", true);
    store.setFilter("slack:U1", "WIP");
    expect(store.get("slack:U1").enabled).toBe(true);
  });

  it("counts enabled users", () => {
    store.setEnabled("slack:U1", true);
    store.setEnabled("slack:U2", true);
    store.setEnabled("slack:U3", false);
    expect(store.countEnabled()).toBe(2);
  });
});
