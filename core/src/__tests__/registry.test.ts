import { DappRegistry, RegistryConfig, RegistryError, isRegistryError } from "../registry";
import { MemoryStore } from "../memory-store";
import { NULL_IDENTITY } from "../identity";
import { JournalEntry, RegistryEvent } from "../schemas";

const ADMIN = "0xadmin";
const ALICE = "0xalice";
const BOB = "0xbob";
const CAROL = "0xcarol";
const NOW = new Date("2026-01-01T00:00:00.000Z");

function makeRegistry(overrides: Partial<RegistryConfig> = {}) {
  const store = new MemoryStore();
  const registry = new DappRegistry({ admin: ADMIN, store, clock: () => NOW, ...overrides });
  return { registry, store };
}

async function initRegistry(overrides: Partial<RegistryConfig> = {}) {
  const made = makeRegistry(overrides);
  await made.registry.init();
  return made;
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isRegistryError(err) ? err.code : "UNEXPECTED";
  }
  return undefined;
}

/** Store whose next append fails once. */
class FlakyStore extends MemoryStore {
  failNext = false;

  async append(entry: JournalEntry): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("disk full");
    }
    return super.append(entry);
  }
}

describe("DappRegistry", () => {
  describe("publish", () => {
    test("1. assigns consecutive ids starting at 1", async () => {
      const { registry } = await initRegistry();
      const ids = [
        await registry.publish("A", "first", "https://git.example/a", ALICE),
        await registry.publish("B", "second", "https://git.example/b", BOB),
        await registry.publish("C", "third", "https://git.example/c", ALICE),
      ];
      expect(ids).toEqual([1, 2, 3]);
      expect(registry.recordCount).toBe(3);
      expect(registry.list().map((r) => r.id)).toEqual([1, 2, 3]);
    });

    test("2. rejects each empty text field with INVALID_INPUT and leaves the count alone", async () => {
      const { registry } = await initRegistry();
      await expect(registry.publish("", "d", "r", ALICE)).rejects.toMatchObject({
        code: "INVALID_INPUT",
        details: { field: "name" },
      });
      await expect(registry.publish("n", "", "r", ALICE)).rejects.toMatchObject({
        code: "INVALID_INPUT",
        details: { field: "description" },
      });
      await expect(registry.publish("n", "d", "", ALICE)).rejects.toMatchObject({
        code: "INVALID_INPUT",
        details: { field: "repoLink" },
      });
      expect(registry.recordCount).toBe(0);
    });

    test("3. stores the record as published by the caller", async () => {
      const { registry } = await initRegistry();
      const id = await registry.publish("Foo", "desc", "http://x", ALICE);
      expect(id).toBe(1);
      expect(registry.get(1)).toEqual({
        id: 1,
        owner: ALICE,
        name: "Foo",
        description: "desc",
        repo_link: "http://x",
        verified: false,
        created_at: "2026-01-01T00:00:00.000Z",
      });
    });

    test("4. serializes concurrent publishes into distinct consecutive ids", async () => {
      const { registry, store } = await initRegistry();
      const ids = await Promise.all(
        ["a", "b", "c", "d", "e"].map((n) => registry.publish(n, "desc", `https://git.example/${n}`, ALICE))
      );
      expect(ids).toEqual([1, 2, 3, 4, 5]);
      expect(store.entries().map((e) => e.seq)).toEqual([0, 1, 2, 3, 4, 5]);
      expect(registry.get(3).name).toBe("c");
    });
  });

  describe("verify", () => {
    test("5. only the admin can verify", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);

      await expect(registry.verify(1, ALICE)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
      expect(registry.get(1).verified).toBe(false);

      await registry.verify(1, ADMIN);
      expect(registry.get(1).verified).toBe(true);
    });

    test("6. verifying twice fails with ALREADY_VERIFIED", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);
      await registry.verify(1, ADMIN);

      await expect(registry.verify(1, ADMIN)).rejects.toMatchObject({ code: "ALREADY_VERIFIED" });
      expect(registry.get(1).verified).toBe(true);
      expect(registry.getEventLog().filter((e) => e.type === "Verified")).toHaveLength(1);
    });

    test("7. unknown ids fail with NOT_FOUND for the admin and UNAUTHORIZED for others", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);

      for (const id of [0, -1, 2, 999]) {
        await expect(registry.verify(id, ADMIN)).rejects.toMatchObject({ code: "NOT_FOUND" });
      }
      await expect(registry.verify(999, ALICE)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    });
  });

  describe("transferOwnership", () => {
    test("8. the current owner can transfer, the previous owner cannot", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);

      await registry.transferOwnership(1, BOB, ALICE);
      expect(registry.get(1).owner).toBe(BOB);

      await expect(registry.transferOwnership(1, CAROL, ALICE)).rejects.toMatchObject({
        code: "UNAUTHORIZED",
      });
      expect(registry.get(1).owner).toBe(BOB);

      await registry.transferOwnership(1, CAROL, BOB);
      expect(registry.get(1).owner).toBe(CAROL);
    });

    test("9. transfer leaves every other field unchanged", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);
      await registry.verify(1, ADMIN);
      const before = registry.get(1);

      await registry.transferOwnership(1, BOB, ALICE);
      expect(registry.get(1)).toEqual({ ...before, owner: BOB });
    });

    test("10. unknown ids fail with NOT_FOUND", async () => {
      const { registry } = await initRegistry();
      await expect(registry.transferOwnership(1, BOB, ALICE)).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(registry.transferOwnership(0, BOB, NULL_IDENTITY)).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
    });

    test("11. null new owners fail with INVALID_INPUT after the owner check", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);

      for (const target of [NULL_IDENTITY, "", "   ", "0x0"]) {
        await expect(registry.transferOwnership(1, target, ALICE)).rejects.toMatchObject({
          code: "INVALID_INPUT",
          details: { field: "newOwner" },
        });
      }
      await expect(registry.transferOwnership(1, NULL_IDENTITY, BOB)).rejects.toMatchObject({
        code: "UNAUTHORIZED",
      });
      expect(registry.get(1).owner).toBe(ALICE);
    });
  });

  describe("get", () => {
    test("12. ids outside 1..recordCount fail with NOT_FOUND", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);

      expect(errorCode(() => registry.get(1))).toBeUndefined();
      for (const id of [0, -1, 2, 999, 1.5, Number.NaN]) {
        expect(errorCode(() => registry.get(id))).toBe("NOT_FOUND");
      }
      expect(() => registry.get(999)).toThrow(RegistryError);
      expect(registry.exists(1)).toBe(true);
      expect(registry.exists(999)).toBe(false);
    });

    test("13. returns frozen snapshots that stay identical between mutations", async () => {
      const { registry } = await initRegistry();
      await registry.publish("Foo", "desc", "http://x", ALICE);

      const first = registry.get(1);
      const second = registry.get(1);
      expect(Object.isFrozen(first)).toBe(true);
      expect(second).toEqual(first);

      await registry.verify(1, ADMIN);
      expect(first.verified).toBe(false);
      expect(registry.get(1).verified).toBe(true);
    });
  });

  describe("queries", () => {
    test("14. lists by owner and verification state", async () => {
      const { registry } = await initRegistry();
      await registry.publish("A", "first", "https://git.example/a", ALICE);
      await registry.publish("B", "second", "https://git.example/b", BOB);
      await registry.publish("C", "third", "https://git.example/c", ALICE);
      await registry.verify(3, ADMIN);

      expect(registry.listByOwner(ALICE).map((r) => r.id)).toEqual([1, 3]);
      expect(registry.listByOwner(CAROL)).toEqual([]);
      expect(registry.listVerified().map((r) => r.id)).toEqual([3]);
      expect(registry.isAdmin(ADMIN)).toBe(true);
      expect(registry.isAdmin(ALICE)).toBe(false);
      expect(registry.admin).toBe(ADMIN);
    });
  });

  describe("events", () => {
    test("15. emits one event per successful mutation", async () => {
      const events: RegistryEvent[] = [];
      const { registry } = await initRegistry({ onEvent: (e) => events.push(e) });

      await registry.publish("Foo", "desc", "http://x", ALICE);
      await registry.verify(1, ADMIN);
      await registry.transferOwnership(1, BOB, ALICE);
      await expect(registry.verify(1, ADMIN)).rejects.toThrow(RegistryError);

      expect(events.map((e) => e.type)).toEqual(["Published", "Verified", "OwnershipTransferred"]);
      expect(events[0]).toMatchObject({
        type: "Published",
        dapp_id: 1,
        developer: ALICE,
        name: "Foo",
        repo_link: "http://x",
        timestamp: "2026-01-01T00:00:00.000Z",
      });
      expect(events[1]).toMatchObject({ type: "Verified", dapp_id: 1, verifier: ADMIN });
      expect(events[2]).toMatchObject({
        type: "OwnershipTransferred",
        dapp_id: 1,
        old_developer: ALICE,
        new_developer: BOB,
      });
      expect(new Set(events.map((e) => e.event_id)).size).toBe(3);
      expect(registry.getEventLog()).toEqual(events);
    });

    test("16. subscribers can unsubscribe", async () => {
      const { registry } = await initRegistry();
      const seen: number[] = [];
      const unsubscribe = registry.subscribe((e) => seen.push(e.dapp_id));

      await registry.publish("A", "first", "https://git.example/a", ALICE);
      unsubscribe();
      await registry.publish("B", "second", "https://git.example/b", ALICE);

      expect(seen).toEqual([1]);
    });

    test("17. a throwing listener is reported and does not fail the mutation", async () => {
      const onError = jest.fn();
      const { registry } = await initRegistry({ onError });
      registry.subscribe(() => {
        throw new Error("listener broke");
      });

      await expect(registry.publish("Foo", "desc", "http://x", ALICE)).resolves.toBe(1);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0].message).toBe("listener broke");
      expect(onError.mock.calls[0][1]).toBe("listener");
      expect(registry.recordCount).toBe(1);
    });

    test("18. the event log evicts the oldest events beyond its limit", async () => {
      const { registry } = await initRegistry({ maxEventLogSize: 2 });
      await registry.publish("A", "first", "https://git.example/a", ALICE);
      await registry.publish("B", "second", "https://git.example/b", ALICE);
      await registry.publish("C", "third", "https://git.example/c", ALICE);

      expect(registry.getEventLog().map((e) => e.dapp_id)).toEqual([2, 3]);
      registry.clearEventLog();
      expect(registry.getEventLog()).toEqual([]);
    });
  });

  describe("persistence", () => {
    test("19. a fresh store receives a genesis entry naming the admin", async () => {
      const { store } = await initRegistry();
      expect(store.entries()).toEqual([
        { seq: 0, kind: "genesis", admin: ADMIN, created_at: "2026-01-01T00:00:00.000Z" },
      ]);
    });

    test("20. a failed append changes nothing and emits nothing", async () => {
      const store = new FlakyStore();
      const onEvent = jest.fn();
      const registry = new DappRegistry({ admin: ADMIN, store, clock: () => NOW, onEvent });
      await registry.init();

      store.failNext = true;
      await expect(registry.publish("Foo", "desc", "http://x", ALICE)).rejects.toThrow("disk full");
      expect(registry.recordCount).toBe(0);
      expect(onEvent).not.toHaveBeenCalled();

      await expect(registry.publish("Foo", "desc", "http://x", ALICE)).resolves.toBe(1);
      expect(store.entries().map((e) => e.seq)).toEqual([0, 1]);
    });

    test("21. a new registry on the same store replays prior state", async () => {
      const { registry, store } = await initRegistry();
      await registry.publish("A", "first", "https://git.example/a", ALICE);
      await registry.publish("B", "second", "https://git.example/b", BOB);
      await registry.verify(2, ADMIN);
      await registry.transferOwnership(1, CAROL, ALICE);
      const snapshot = registry.list();
      await registry.shutdown();

      const reopened = new DappRegistry({ admin: ADMIN, store, clock: () => NOW });
      await reopened.init();
      expect(reopened.list()).toEqual(snapshot);
      expect(reopened.recordCount).toBe(2);

      await expect(reopened.publish("C", "third", "https://git.example/c", ALICE)).resolves.toBe(3);
      expect(store.entries().map((e) => e.seq)).toEqual([0, 1, 2, 3, 4, 5]);
    });

    test("22. reopening with a different admin fails", async () => {
      const { store } = await initRegistry();
      const other = new DappRegistry({ admin: "0xmallory", store });
      await expect(other.init()).rejects.toThrow(/does not match configured admin/);
      expect(() => other.get(1)).toThrow(/not initialized/);
    });
  });

  describe("lifecycle", () => {
    test("23. rejects a null admin", () => {
      expect(() => new DappRegistry({ admin: NULL_IDENTITY })).toThrow(RegistryError);
      expect(errorCode(() => new DappRegistry({ admin: "" }))).toBe("INVALID_INPUT");
    });

    test("24. operations before init fail", async () => {
      const { registry } = makeRegistry();
      expect(() => registry.get(1)).toThrow(/not initialized/);
      expect(() => registry.recordCount).toThrow(/not initialized/);
      expect(() => registry.admin).toThrow(/not initialized/);
      expect(() => registry.isAdmin(ADMIN)).toThrow(/not initialized/);
      await expect(registry.publish("Foo", "desc", "http://x", ALICE)).rejects.toThrow(/not initialized/);
    });

    test("25. a mutation queued behind shutdown is rejected", async () => {
      const { registry, store } = await initRegistry();
      const closing = registry.shutdown();
      const publishing = registry.publish("Foo", "desc", "http://x", ALICE);

      await closing;
      await expect(publishing).rejects.toThrow(/not initialized/);
      expect(store.entries()).toHaveLength(1);
    });
  });

  describe("event immutability", () => {
    test("26. events handed to listeners are the frozen journal entries", async () => {
      const seen: RegistryEvent[] = [];
      const { registry, store } = await initRegistry({ onEvent: (e) => seen.push(e) });
      await registry.publish("Foo", "desc", "http://x", ALICE);

      expect(Object.isFrozen(seen[0])).toBe(true);
      expect(Object.isFrozen(registry.getEventLog()[0])).toBe(true);
      const entry = store.entries()[1];
      expect(entry.kind === "event" && entry.event).toBe(seen[0]);
      expect(() => Object.assign(seen[0], { developer: BOB })).toThrow(TypeError);
      expect(entry).toMatchObject({ event: { developer: ALICE } });
    });
  });
});
