export * from "./alphabet";
export * from "./canvas-screen";
export * from "./colours";
export * from "./conversion";
export * from "./coords";
export * from "./dictionary";
export * from "./errors";
export * from "./files";
export * from "./frame-rate";
export * from "./input";
export * from "./logger";
export * from "./model";
export * from "./models";
export * from "./node";
export * from "./ppm";
export * from "./render";
export * from "./scene";
export * from "./scheduler";
export * from "./session";
export * from "./settings";
export * from "./tape";
export * from "./training";
export * from "./trie";
export type * from "./types";
export * from "./view";
