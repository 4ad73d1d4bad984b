/**
 * Lists subscriptions and their databases, then creates a database and waits
 * for the task to finish. Reads credentials from REDIS_CLOUD_API_KEY and
 * REDIS_CLOUD_API_SECRET.
 */

import {
  CloudClient,
  ConsoleObservability,
  ApiRequest,
  ServiceBuilder,
  isCloudError,
} from "../src/public.js";

async function main(): Promise<void> {
  const client = CloudClient.fromEnv();

  const { account } = await client.account().getCurrentAccount();
  console.log(`Account ${account?.id ?? "?"}: ${account?.name ?? "unnamed"}`);

  const { subscriptions = [] } = await client.subscriptions().getAllSubscriptions();
  for (const subscription of subscriptions) {
    if (subscription.id === undefined) {
      continue;
    }
    console.log(`Subscription ${subscription.id} (${subscription.status ?? "unknown"})`);
    for await (const database of client.databases().streamDatabases(subscription.id)) {
      console.log(`  ${database.databaseId} ${database.name ?? ""} ${database.publicEndpoint ?? ""}`);
    }
  }

  const first = subscriptions[0]?.id;
  if (first === undefined) {
    return;
  }

  const task = await client.databases().createDatabase(first, {
    name: "example-cache",
    datasetSizeInGb: 1,
    dataPersistence: "none",
  });
  if (task.taskId !== undefined) {
    const done = await client.tasks().waitForTask(task.taskId, {
      interval: 2000,
      onProgress: (update) => console.log(`  task ${update.status ?? "?"}`),
    });
    console.log(`Database created: ${done.response?.resourceId ?? "unknown id"}`);
  }

  // The same calls through the middleware stack, with logging
  const logged = CloudClient.builder()
    .apiKey(process.env.REDIS_CLOUD_API_KEY ?? "")
    .apiSecret(process.env.REDIS_CLOUD_API_SECRET ?? "")
    .observability(new ConsoleObservability({ level: "warn" }))
    .build();
  const service = new ServiceBuilder()
    .circuitBreaker({ failureThreshold: 5, timeout: 30000 })
    .rateLimit({ tokensPerSecond: 5 })
    .retry({ maxRetries: 3, baseDelay: 500 })
    .service(logged.intoService());

  const response = await service.call(ApiRequest.get("/tasks"));
  console.log(`GET /tasks answered ${response.status}`);
}

main().catch((error: unknown) => {
  if (isCloudError(error)) {
    console.error(`${error.category}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
