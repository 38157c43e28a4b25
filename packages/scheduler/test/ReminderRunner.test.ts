import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReminderRunner, ReminderStore, type ReminderDelivery } from "../src";
import { tempDir } from "./fakes";

const CREATED = new Date("2025-06-18T10:00:00Z");

describe("ReminderRunner", () => {
  let cleanup: () => Promise<void>;
  let store: ReminderStore;

  beforeEach(async () => {
    const temp = await tempDir("reminder-runner");
    cleanup = temp.cleanup;
    store = new ReminderStore({ dataFile: join(temp.dir, "reminders.json"), now: () => CREATED });
    await store.add({
      owner: "100",
      channelId: "c1",
      message: "stretch",
      fireAt: new Date("2025-06-18T10:05:00Z"),
      replyToMessageId: "m1",
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  it("delivers_due_reminders_with_elapsed_time_and_removes_them", async () => {
    const deliver = vi.fn<ReminderDelivery["deliver"]>(async () => {});
    const runner = new ReminderRunner({ store, delivery: { deliver } });

    expect(await runner.tick(new Date("2025-06-18T10:04:59Z"))).toEqual({ delivered: [], failed: [] });
    expect(deliver).not.toHaveBeenCalled();

    expect(await runner.tick(new Date("2025-06-18T10:05:00Z"))).toEqual({ delivered: [1], failed: [] });
    expect(deliver).toHaveBeenCalledWith(
      {
        id: 1,
        owner: "100",
        channelId: "c1",
        message: "stretch",
        fireAt: "2025-06-18T10:05:00.000Z",
        createdAt: "2025-06-18T10:00:00.000Z",
        replyToMessageId: "m1",
      },
      { elapsed: "5m" }
    );
    expect(await store.due(new Date("2025-06-18T11:00:00Z"))).toEqual([]);
  });

  it("failed_delivery_is_retried_next_tick", async () => {
    const deliver = vi
      .fn<ReminderDelivery["deliver"]>()
      .mockRejectedValueOnce(new Error("channel unavailable"))
      .mockResolvedValueOnce(undefined);
    const runner = new ReminderRunner({ store, delivery: { deliver } });

    expect(await runner.tick(new Date("2025-06-18T10:06:00Z"))).toEqual({ delivered: [], failed: [1] });
    expect(await store.due(new Date("2025-06-18T10:06:00Z"))).toHaveLength(1);

    expect(await runner.tick(new Date("2025-06-18T12:05:00Z"))).toEqual({ delivered: [1], failed: [] });
    expect(deliver).toHaveBeenLastCalledWith(expect.objectContaining({ id: 1 }), { elapsed: "2h" });
    expect(await store.due(new Date("2025-06-18T12:05:00Z"))).toEqual([]);
  });
});
