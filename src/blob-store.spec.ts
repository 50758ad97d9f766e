import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { SqliteBlobStore } from "./blob-store";

describe("SqliteBlobStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stillpoint-blobs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns null for a key that was never written", () => {
    const store = new SqliteBlobStore({ path: ":memory:" });
    expect(store.get("missing")).toBeNull();
    store.close();
  });

  it("overwrites the value stored under a key", () => {
    const store = new SqliteBlobStore({ path: ":memory:" });
    store.set("sessions", Buffer.from("first"));
    store.set("sessions", Buffer.from("second"));
    expect(store.get("sessions")?.toString("utf8")).toBe("second");
    store.close();
  });

  it("keeps values in the database file between instances", () => {
    const dbPath = path.join(dir, "blobs.sqlite");
    const first = new SqliteBlobStore({ path: dbPath });
    first.set("sessions", Buffer.from("kept"));
    first.close();

    const second = new SqliteBlobStore({ path: dbPath });
    expect(second.get("sessions")?.toString("utf8")).toBe("kept");
    second.close();
  });

  it("wipes the database file on a fresh start", () => {
    const dbPath = path.join(dir, "blobs.sqlite");
    const first = new SqliteBlobStore({ path: dbPath });
    first.set("sessions", Buffer.from("old"));
    first.close();

    const fresh = new SqliteBlobStore({ path: dbPath, freshStart: true });
    expect(fresh.get("sessions")).toBeNull();
    fresh.close();
  });
});
