import http from "http";
import { loadConfig } from "./config";
import { createApp } from "./server";
import { SubscriberState } from "./state";
import { createStore } from "./store";

async function start() {
  const config = loadConfig();
  const state = new SubscriberState(createStore(config));

  // A fresh process always starts from empty sets, whatever the backend holds.
  await state.initialize();

  const app = await createApp(state, config);
  const server = http.createServer(app);

  server.listen(config.port, () => {
    console.log(`pubsub subscriber listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      state
        .close()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error("Error closing subscriber state", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err) => {
  console.error("Failed to start server", err);
  process.exit(1);
});
