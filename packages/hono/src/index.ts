export * from "./HonoAdapter";
export * from "./SessionRoutes";
