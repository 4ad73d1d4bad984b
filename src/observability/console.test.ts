import { describe, it, expect } from "vitest";
import { ConsoleObservability } from "./console.js";
import { CloudError } from "../core/errors.js";

const at = new Date("2024-01-01T00:00:00.000Z");

function capture(level?: "info" | "warn" | "error") {
  const lines: string[] = [];
  const adapter = new ConsoleObservability({
    write: (line) => lines.push(line),
    ...(level ? { level } : {}),
  });
  return { lines, adapter };
}

describe("ConsoleObservability", () => {
  it("writes one JSON line per response", () => {
    const { lines, adapter } = capture();

    adapter.logResponse({
      endpoint: "/subscriptions",
      method: "GET",
      requestId: "r-1",
      statusCode: 200,
      duration: 12,
      timestamp: at,
    });

    expect(lines).toEqual([
      '{"level":"info","type":"response","endpoint":"/subscriptions","method":"GET","requestId":"r-1","statusCode":200,"duration":12,"timestamp":"2024-01-01T00:00:00.000Z"}',
    ]);
  });

  it("describes errors by category and status", () => {
    const { lines, adapter } = capture();

    adapter.logError({
      endpoint: "/subscriptions/1",
      method: "GET",
      requestId: "r-2",
      error: new CloudError("Not Found (404): gone", "not_found", { status: 404 }),
      duration: 5,
      timestamp: at,
    });

    const [line] = lines;
    expect(JSON.parse(line ?? "")).toEqual({
      level: "error",
      type: "error",
      endpoint: "/subscriptions/1",
      method: "GET",
      requestId: "r-2",
      error: {
        category: "not_found",
        status: 404,
        message: "Not Found (404): gone",
        retryable: false,
      },
      duration: 5,
      timestamp: "2024-01-01T00:00:00.000Z",
    });
  });

  it("redacts secrets in warning metadata", () => {
    const { lines, adapter } = capture();

    adapter.logWarning("slow response", { apiKey: "test-key", nested: { password: "pw", region: "eu" } });

    const [line] = lines;
    expect(JSON.parse(line ?? "").metadata).toEqual({
      apiKey: "[REDACTED]",
      nested: { password: "[REDACTED]", region: "eu" },
    });
  });

  it("drops events below the configured level", () => {
    const { lines, adapter } = capture("warn");

    adapter.recordMetric({ name: "cloud.request.count", value: 1, tags: {}, timestamp: at });
    adapter.logWarning("retrying");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "").type).toBe("warning");
  });
});
