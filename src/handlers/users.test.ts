import { describe, it, expect } from "vitest";
import { MockCloudApi } from "../testing/mock-api.js";
import { UserFixture } from "../testing/fixtures.js";
import { accepted, notFound, success } from "../testing/responses.js";

describe("UsersHandler", () => {
  it("lists account users", async () => {
    const api = new MockCloudApi().on(
      "GET",
      "/users",
      success({ account: 1001, users: [new UserFixture(7, "ops@example.test").role("owner").build()] })
    );

    const users = await api.client().users().getAllUsers();

    expect(users.users?.[0]).toEqual({
      id: 7,
      email: "ops@example.test",
      role: "owner",
      status: "active",
    });
  });

  it("updates a user's role", async () => {
    const api = new MockCloudApi().on("PUT", "/users/:id", accepted("t-9", "userUpdateRequest"));

    const task = await api.client().users().updateUser(7, { name: "Ops", role: "viewer" });

    expect(task.taskId).toBe("t-9");
    expect(api.calls[0]?.params).toEqual({ id: "7" });
    expect(api.calls[0]?.body).toEqual({ name: "Ops", role: "viewer" });
  });

  it("surfaces a missing user as not_found", async () => {
    const api = new MockCloudApi().on("GET", "/users/:id", notFound("User 99 not found"));

    await expect(api.client().users().getUserById(99)).rejects.toMatchObject({
      category: "not_found",
      status: 404,
    });
  });
});
