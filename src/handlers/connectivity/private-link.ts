/**
 * AWS PrivateLink.
 *
 * Bodies and responses are passed through as JSON; a create body looks like
 * `{ shareName, principal, type: "aws_account", alias }`.
 */

import type { CloudClient } from "../../client.js";
import type { JsonValue } from "../../core/types.js";
import { segment } from "../common.js";

export class PrivateLinkHandler {
  constructor(private readonly client: CloudClient) {}

  private base(subscriptionId: number): string {
    return `/subscriptions/${segment(subscriptionId)}/private-link`;
  }

  private regionBase(subscriptionId: number, regionId: number): string {
    return `/subscriptions/${segment(subscriptionId)}/regions/${segment(regionId)}/private-link`;
  }

  get(subscriptionId: number): Promise<JsonValue> {
    return this.client.getRaw(this.base(subscriptionId));
  }

  create(subscriptionId: number, request: JsonValue): Promise<JsonValue> {
    return this.client.postRaw(this.base(subscriptionId), request);
  }

  delete(subscriptionId: number): Promise<JsonValue> {
    return this.client.deleteRaw(this.base(subscriptionId));
  }

  addPrincipals(subscriptionId: number, request: JsonValue): Promise<JsonValue> {
    return this.client.postRaw(`${this.base(subscriptionId)}/principals`, request);
  }

  removePrincipals(subscriptionId: number, request: JsonValue): Promise<JsonValue> {
    return this.client.deleteWithBody<JsonValue>(`${this.base(subscriptionId)}/principals`, request);
  }

  getEndpointScript(subscriptionId: number): Promise<JsonValue> {
    return this.client.getRaw(`${this.base(subscriptionId)}/endpoint-script`);
  }

  getActiveActive(subscriptionId: number, regionId: number): Promise<JsonValue> {
    return this.client.getRaw(this.regionBase(subscriptionId, regionId));
  }

  createActiveActive(
    subscriptionId: number,
    regionId: number,
    request: JsonValue
  ): Promise<JsonValue> {
    return this.client.postRaw(this.regionBase(subscriptionId, regionId), request);
  }

  addPrincipalsActiveActive(
    subscriptionId: number,
    regionId: number,
    request: JsonValue
  ): Promise<JsonValue> {
    return this.client.postRaw(`${this.regionBase(subscriptionId, regionId)}/principals`, request);
  }

  removePrincipalsActiveActive(
    subscriptionId: number,
    regionId: number,
    request: JsonValue
  ): Promise<JsonValue> {
    return this.client.deleteWithBody<JsonValue>(
      `${this.regionBase(subscriptionId, regionId)}/principals`,
      request
    );
  }

  getEndpointScriptActiveActive(subscriptionId: number, regionId: number): Promise<JsonValue> {
    return this.client.getRaw(`${this.regionBase(subscriptionId, regionId)}/endpoint-script`);
  }
}
