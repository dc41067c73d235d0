/**
 * HTTP Server Entry Point
 * Starts the Express application and validates configuration.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { app } from "./app.js";
import { initializeApp } from "./config/init.js";
import { PORT } from "./config/env.js";

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

/**
 * Starts the HTTP server immediately.
 * Initialization runs after listen; an invalid config stops the process.
 */
server.listen(PORT, "0.0.0.0", () => {
  console.log(`Server running on 0.0.0.0:${PORT}`);

  initializeApp()
    .then(() => {
      console.log("✓ Server ready to accept requests\n");
    })
    .catch((error) => {
      console.error("✗ Initialization failed:", error);
      process.exit(1);
    });
});

process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
