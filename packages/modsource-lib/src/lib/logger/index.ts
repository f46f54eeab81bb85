export { backendLogger, serverLogger } from "./server";
export * from "./types";
