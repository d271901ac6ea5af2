export * from "./config";
export * from "./decorator/decorator";
export * from "./errors";
export * from "./host/memoryHost";
export * from "./locator/regionLocator";
export * from "./logger";
export * from "./mode/tidyMode";
export * from "./parser/outlineParser";
export type * from "./parser/types";
export * from "./registry/decorationRegistry";
export * from "./restorer/restorer";
export * from "./session/tidySession";
export * from "./style/styleResolver";
export * from "./types";
