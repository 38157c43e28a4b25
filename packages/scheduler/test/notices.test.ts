import { describe, expect, it } from "vitest";
import { formatNotice } from "../src";

describe("formatNotice", () => {
  it("formats_each_notice_in_local_time", () => {
    expect(
      formatNotice({ type: "fired", scheduledFor: "2025-06-18T06:00:00.000Z", firedAt: "2025-06-18T06:00:10.000Z" })
    ).toBe("Scheduled action for 08:00 completed at 08:00.");

    expect(formatNotice({ type: "failed", scheduledFor: "2025-06-18T06:00:00.000Z", error: "timeout" })).toBe(
      "Scheduled action for 08:00 failed: timeout\nIt will be retried after a restart, or run it manually."
    );

    expect(
      formatNotice({ type: "recovered", scheduledFor: "2025-06-18T06:00:00.000Z", firedAt: "2025-06-18T06:12:00.000Z" })
    ).toBe("Missed action from 08:00 was recovered at 08:12 after a restart.");

    expect(formatNotice({ type: "recovery_failed", scheduledFor: "2025-06-18T06:00:00.000Z", error: "timeout" })).toBe(
      "Missed action from 08:00 could not be recovered: timeout\nRun it manually if it is still needed."
    );

    expect(formatNotice({ type: "expiring", expiresAt: "2025-06-18T16:00:10.000Z" })).toBe(
      "Your scheduled action expires at 18:00, in about a minute."
    );
  });

  it("uses_the_given_time_zone", () => {
    expect(formatNotice({ type: "expiring", expiresAt: "2025-06-18T16:00:00.000Z" }, "UTC")).toBe(
      "Your scheduled action expires at 16:00, in about a minute."
    );
  });
});
