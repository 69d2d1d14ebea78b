export * from "./jobs.js";
export * from "./events.js";
export * from "./project.js";
