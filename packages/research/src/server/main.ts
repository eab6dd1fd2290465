import { getPort } from "../lib/settings";
import { createApp } from "./app";
import { defaultServices } from "./services";

const main = () => {
  const port = getPort();
  const app = createApp(defaultServices);
  const server = app.listen(port, () => {
    console.log(`[server] listening on http://localhost:${port}`);
  });

  const shutdown = () => {
    console.log("[server] shutting down");
    server.close((error) => {
      if (error) {
        console.error("[server] close failed:", error.message);
        process.exitCode = 1;
      }
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

main();
