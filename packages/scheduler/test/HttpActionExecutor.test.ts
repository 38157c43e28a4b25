import { describe, expect, it, vi } from "vitest";
import { HttpActionExecutor, type ActionContext } from "../src";

const CONTEXT: ActionContext = { owner: "100", reason: "manual", scheduledFor: null };

function createExecutor(fetchImpl: typeof fetch) {
  return new HttpActionExecutor({
    url: "https://parking.test/confirm",
    buildBody: (profile, context) => ({ plate: profile.plate, reason: context.reason }),
    headers: { "x-api-key": "test-secret" },
    fetch: fetchImpl,
  });
}

describe("HttpActionExecutor", () => {
  it("posts_the_built_body_as_json", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("ok", { status: 200 }));

    await createExecutor(fetchMock).execute({ plate: "AB12345" }, CONTEXT);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://parking.test/confirm");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "content-type": "application/json", "x-api-key": "test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({ plate: "AB12345", reason: "manual" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("non_2xx_response_fails_with_status_and_body", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("area closed", { status: 409 }));

    await expect(createExecutor(fetchMock).execute({ plate: "AB12345" }, CONTEXT)).rejects.toMatchObject({
      code: "EXECUTOR_FAILED",
      message: "Request failed with status 409: area closed",
      details: { owner: "100", status: 409, body: "area closed" },
    });
  });

  it("transport_error_fails_with_executor_failed", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(createExecutor(fetchMock).execute({ plate: "AB12345" }, CONTEXT)).rejects.toMatchObject({
      code: "EXECUTOR_FAILED",
      message: "Request failed: fetch failed",
    });
  });
});
