export { tryParseSource } from "./parse-source";
export { parseSources } from "./parse-sources";
export { vendorPathFor } from "./vendor-path";
