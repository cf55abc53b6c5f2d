import { describe, expect, it } from "vitest";
import { createFakeFetch, jsonResponse } from "../../testing/fakes.js";
import { BackendRequestError, InternalApiClient } from "./internal-api.js";

function clientFor(fetchImpl: typeof fetch): InternalApiClient {
  return new InternalApiClient({ baseUrl: "http://backend.test/internal/", token: "test-token", timeoutMs: 1000, fetchImpl });
}

describe("InternalApiClient", () => {
  it("sends GET parameters with the user id and bearer token", async () => {
    const { fetchImpl, requests } = createFakeFetch(() => jsonResponse({ success: true }));

    await clientFor(fetchImpl).request("GET", "/users/u1/history", "u1", { query: { days: 7, muscle: undefined } });

    expect(requests[0].url.toString()).toBe("http://backend.test/internal/users/u1/history?days=7&user_id=u1");
    expect(requests[0].headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-token" });
  });

  it("merges the user id into POST bodies", async () => {
    const { fetchImpl, requests } = createFakeFetch(() => jsonResponse({ success: true, id: 3 }));

    const response = await clientFor(fetchImpl).request("POST", "/exercises/record", "u1", { body: { reps: 10 } });

    expect(response).toEqual({ success: true, id: 3 });
    expect(requests[0].body).toEqual({ reps: 10, user_id: "u1" });
  });

  it("raises on error statuses", async () => {
    const { fetchImpl } = createFakeFetch(() => new Response("down", { status: 503 }));

    const failure = clientFor(fetchImpl).request("GET", "/x", "u1");

    await expect(failure).rejects.toBeInstanceOf(BackendRequestError);
    await expect(failure).rejects.toThrow("backend request failed (GET /x -> 503): down");
  });

  it("rejects responses that are not JSON objects", async () => {
    const { fetchImpl } = createFakeFetch(() => jsonResponse([1, 2]));

    await expect(clientFor(fetchImpl).request("GET", "/x", "u1")).rejects.toThrow(
      "backend response is not a JSON object (GET /x)",
    );
  });
});
