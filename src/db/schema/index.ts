export * from "./flavors.js";
export * from "./images.js";
export * from "./schema-migrations.js";
export * from "./server-transitions.js";
export * from "./servers.js";
