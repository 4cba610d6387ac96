export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./rng";
export * from "./shoe";
export * from "./hand";
export * from "./dealer";
export * from "./strategy";
export * from "./player";
export * from "./game";
export * from "./stats";
export * from "./simulate";
