export * from "./links.js";
export * from "./nodes.js";
export * from "./poll-runs.js";
export * from "./samples.js";
