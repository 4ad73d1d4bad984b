import { describe, it, expect } from "vitest";
import { MockCloudApi } from "../testing/mock-api.js";
import { accepted, success } from "../testing/responses.js";

describe("CloudAccountsHandler", () => {
  it("lists cloud accounts", async () => {
    const api = new MockCloudApi().on(
      "GET",
      "/cloud-accounts",
      success({ accountId: 1001, cloudAccounts: [{ id: 3, name: "aws-main", provider: "AWS" }] })
    );

    const accounts = await api.client().cloudAccounts().getCloudAccounts();

    expect(accounts.cloudAccounts?.[0]?.name).toBe("aws-main");
  });

  it("creates a cloud account", async () => {
    const api = new MockCloudApi().on(
      "POST",
      "/cloud-accounts",
      accepted("t-2", "cloudAccountCreateRequest")
    );

    await api.client().cloudAccounts().createCloudAccount({
      name: "aws-main",
      provider: "AWS",
      accessKeyId: "test-access-key",
      accessSecretKey: "test-secret",
      consoleUsername: "console-user",
      consolePassword: "test-password",
      signInLoginUrl: "https://signin.example.test",
    });

    expect(api.calls[0]?.body).toMatchObject({ name: "aws-main", provider: "AWS" });
  });

  it("deletes a cloud account by id", async () => {
    const api = new MockCloudApi().on(
      "DELETE",
      "/cloud-accounts/:id",
      accepted("t-3", "cloudAccountDeleteRequest")
    );

    const task = await api.client().cloudAccounts().deleteCloudAccount(3);

    expect(task.taskId).toBe("t-3");
    expect(api.calls[0]?.params).toEqual({ id: "3" });
  });
});
