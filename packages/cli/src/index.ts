export * from "./bootstrap";
export * from "./commands";
export * from "./logger";
