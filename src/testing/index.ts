/**
 * Test tooling for code built on the client: an in-process API stand-in,
 * canned responses and response-body fixtures.
 */

export * from "./mock-api.js";
export * as responses from "./responses.js";
export type { MockResponse } from "./responses.js";
export * from "./fixtures.js";
