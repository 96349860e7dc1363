import { describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { flatDocument } from "../test/status-documents.js";
import { describeError, type FetchFn, StatusClient } from "./status-client.js";

function clientReturning(response: Response | Error) {
  const fetchFn = vi.fn<FetchFn>(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  return { client: new StatusClient({ port: 8080, fetchFn }), fetchFn };
}

const signal = new AbortController().signal;

describe("StatusClient.fetchAndParse", () => {
  it("requests the status document with services and link data", async () => {
    const { client, fetchFn } = clientReturning(new Response(JSON.stringify(flatDocument())));
    await client.fetchAndParse("10.1.2.3", signal);
    expect(fetchFn).toHaveBeenCalledWith("http://10.1.2.3:8080/cgi-bin/sysinfo.json?services_local=1&link_info=1", {
      method: "GET",
      signal,
    });
  });

  it("returns a normalized observation on success", async () => {
    const { client } = clientReturning(new Response(JSON.stringify(flatDocument())));
    await expect(client.fetchAndParse("10.1.2.3", signal)).resolves.toMatchObject({
      address: "10.1.2.3",
      name: "k6abc-hill",
      generation: "flat",
    });
  });

  it("maps non-200 responses to FetchHttpError", async () => {
    const { client } = clientReturning(new Response("Not Found", { status: 404 }));
    await expect(client.fetchAndParse("10.1.2.3", signal)).resolves.toEqual({
      address: "10.1.2.3",
      dnsName: "",
      category: "FetchHttpError",
      details: "404: Not Found",
    });
  });

  it("maps invalid JSON to FetchParseError and keeps the body", async () => {
    const { client } = clientReturning(new Response("<html>oops</html>"));
    await expect(client.fetchAndParse("10.1.2.3", signal)).resolves.toEqual({
      address: "10.1.2.3",
      dnsName: "",
      category: "FetchParseError",
      details: "Invalid JSON: <html>oops</html>",
    });
  });

  it("maps an unsupported schema version to FetchParseError", async () => {
    const body = JSON.stringify({ node: "x", api_version: "1.99", interfaces: [] });
    const { client } = clientReturning(new Response(body));
    await expect(client.fetchAndParse("10.1.2.3", signal)).resolves.toEqual({
      address: "10.1.2.3",
      dnsName: "",
      category: "FetchParseError",
      details: `Unsupported api_version 1.99: ${body}`,
    });
  });

  it("maps connection failures to FetchTransportError", async () => {
    const error = new TypeError("fetch failed", { cause: Object.assign(new Error("connect"), { code: "ECONNREFUSED" }) });
    const { client } = clientReturning(error);
    await expect(client.fetchAndParse("10.1.2.3", signal)).resolves.toEqual({
      address: "10.1.2.3",
      dnsName: "",
      category: "FetchTransportError",
      details: "fetch failed (ECONNREFUSED)",
    });
  });

  it("maps an aborted request to FetchTimeout", async () => {
    const controller = new AbortController();
    controller.abort();
    const abortError = Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    const { client } = clientReturning(abortError);
    await expect(client.fetchAndParse("10.1.2.3", controller.signal)).resolves.toMatchObject({
      category: "FetchTimeout",
    });
  });

  it("truncates oversized diagnostics", async () => {
    const { client } = clientReturning(new Response("x".repeat(5_000), { status: 500 }));
    const result = await client.fetchAndParse("10.1.2.3", signal);
    expect("details" in result && result.details.length).toBe(2_001);
  });
});

describe("StatusClient.fetchTopologyDocument", () => {
  it("returns the decoded document", async () => {
    const { client, fetchFn } = clientReturning(new Response(JSON.stringify({ link_info: {} })));
    await expect(client.fetchTopologyDocument("localnode", signal)).resolves.toEqual({ link_info: {} });
    expect(fetchFn.mock.calls[0][0]).toBe("http://localnode:8080/cgi-bin/sysinfo.json?topology=1&link_info=1");
  });

  it("throws on an HTTP error", async () => {
    const { client } = clientReturning(new Response("", { status: 503 }));
    await expect(client.fetchTopologyDocument("localnode", signal)).rejects.toThrow("HTTP 503 from localnode");
  });
});

describe("describeError", () => {
  it("prefers the cause's error code", () => {
    expect(describeError(new Error("outer", { cause: new Error("inner") }))).toBe("outer (inner)");
    expect(describeError("plain")).toBe("plain");
  });
});
