/**
 * Development server entry point
 *
 * Serves the Hono app from a plain Node HTTP server.
 */

import { createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";
import { createConsoleLogger, logConfigSummary } from "@sso-bridge/core";
import { createApp } from "./app.js";
import { loadConfig, logWebConfigSummary } from "./config.js";
import { createStores } from "./store/index.js";

const config = loadConfig();
const logger = createConsoleLogger({
  enabled: config.sso.logging.enabled,
  level: config.sso.logging.level,
});

logConfigSummary(config.sso, logger.child("config"));
logWebConfigSummary(config, logger.child("config"));

const app = createApp({
  config,
  stores: createStores(config, logger.child("store")),
  logger,
});

const { host, port } = config.server;
const prefix = config.routes.prefix;

console.log("Starting SSO web adapter...");
console.log("");
console.log("Endpoints:");
console.log(`  Login:    http://${host}:${port}${prefix}/login`);
console.log(`  Callback: http://${host}:${port}${prefix}/callback`);
console.log(`  Logout:   http://${host}:${port}${prefix}/logout (POST)`);
console.log(`  Profile:  http://${host}:${port}/me`);
console.log(`  Health:   http://${host}:${port}/health`);
console.log("");

const server = createServer(getRequestListener(app.fetch));

server.listen(port, host, () => {
  console.log(`Server running at http://${host}:${port}`);
});

// Handle server errors
server.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EADDRINUSE") {
    console.error(`\nError: Port ${port} is already in use.`);
    console.error(`Set a different port: PORT=3001 npm run dev\n`);
  } else {
    console.error("Server error:", err);
  }
  process.exit(1);
});
