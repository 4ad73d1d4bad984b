import { describe, it, expect } from "vitest";
import { MockCloudApi } from "../../testing/mock-api.js";
import { DatabaseFixture } from "../../testing/fixtures.js";
import { accepted, noContent, success } from "../../testing/responses.js";
import { collect } from "../../strategies/pagination.js";

describe("FixedSubscriptionHandler", () => {
  it("filters plans by provider and redis flex", async () => {
    const api = new MockCloudApi().on(
      "GET",
      "/fixed/plans",
      success({ plans: [{ id: 98, name: "Standard 250MB", provider: "AWS", redisFlex: false }] })
    );

    const plans = await api.client().fixedSubscriptions().listPlans("AWS", false);

    expect(plans.plans?.[0]?.id).toBe(98);
    expect(api.calls[0]?.query.toString()).toBe("provider=AWS&redisFlex=false");
  });

  it("reads plans compatible with a subscription", async () => {
    const api = new MockCloudApi().on("GET", "/fixed/plans/subscriptions/:id", success({ plans: [] }));

    await api.client().fixedSubscriptions().getPlansBySubscriptionId(5);

    expect(api.calls[0]?.path).toBe("/fixed/plans/subscriptions/5");
  });

  it("asks for redis versions of a subscription", async () => {
    const api = new MockCloudApi().on("GET", "/fixed/redis-versions", success({ redisVersions: [] }));

    await api.client().fixedSubscriptions().getRedisVersions(5);

    expect(api.calls[0]?.query.get("subscriptionId")).toBe("5");
  });

  it("creates a subscription on a plan", async () => {
    const api = new MockCloudApi().on(
      "POST",
      "/fixed/subscriptions",
      accepted("t-1", "createFixedSubscriptionRequest")
    );

    await api.client().fixedSubscriptions().create({ name: "dev", planId: 98 });

    expect(api.calls[0]?.body).toEqual({ name: "dev", planId: 98 });
  });

  it("deletes a subscription, reporting an empty answer as deleted", async () => {
    const api = new MockCloudApi().on("DELETE", "/fixed/subscriptions/:id", noContent());

    await expect(api.client().fixedSubscriptions().deleteById(5)).resolves.toEqual({
      status: "deleted",
    });
  });
});

describe("FixedDatabaseHandler", () => {
  it("gets a database under the fixed path", async () => {
    const api = new MockCloudApi().on(
      "GET",
      "/fixed/subscriptions/:sub/databases/:db",
      success(new DatabaseFixture(20, "session").build())
    );

    const database = await api.client().fixedDatabases().getById(5, 20);

    expect(database.name).toBe("session");
    expect(api.calls[0]?.path).toBe("/fixed/subscriptions/5/databases/20");
  });

  it("triggers a backup with an explicit path", async () => {
    const api = new MockCloudApi().on(
      "POST",
      "/fixed/subscriptions/:sub/databases/:db/backup",
      accepted("t-2", "databaseBackupRequest")
    );

    await api.client().fixedDatabases().backup(5, 20, { adhocBackupPath: "s3://bucket/dump" });

    expect(api.calls[0]?.body).toEqual({ adhocBackupPath: "s3://bucket/dump" });
  });

  it("passes the upgrade answer through untouched", async () => {
    const api = new MockCloudApi().on(
      "POST",
      "/fixed/subscriptions/:sub/databases/:db/upgrade",
      success({ taskId: "t-3", extra: { note: "queued" } })
    );

    const result = await api
      .client()
      .fixedDatabases()
      .upgradeRedisVersion(5, 20, { targetRedisVersion: "7.4" });

    expect(result).toEqual({ taskId: "t-3", extra: { note: "queued" } });
  });

  it("streams databases across pages", async () => {
    const api = new MockCloudApi().on("GET", "/fixed/subscriptions/:sub/databases", (request) =>
      request.query.get("offset") === "0"
        ? success({
            subscription: {
              subscriptionId: 5,
              databases: [new DatabaseFixture(1, "a").build(), new DatabaseFixture(2, "b").build()],
            },
          })
        : success({ subscription: { subscriptionId: 5, databases: [] } })
    );

    const databases = await collect(api.client().fixedDatabases().streamDatabases(5, 2));

    expect(databases.map((db) => db.databaseId)).toEqual([1, 2]);
    expect(api.calls).toHaveLength(2);
  });
});
