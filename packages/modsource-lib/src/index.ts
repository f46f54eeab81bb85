export * from "./lib";
export * from "./models";
export * from "./actions";
