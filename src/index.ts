import { validateRequiredEnvVars } from "./validate-env.js";

if (process.env.NODE_ENV !== "test") {
  // Before anything reads config, so a missing variable is reported by name.
  validateRequiredEnvVars();
  const [{ config }, { startServer }] = await Promise.all([import("./config/index.js"), import("./server.js")]);
  await startServer(config);
}
