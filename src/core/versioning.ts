/**
 * SDK versioning
 */

import { SDK_VERSION } from "./types.js";

export function defaultUserAgent(): string {
  return `redis-cloud/${SDK_VERSION}`;
}
