export * from "./ExpressAdapter";
