export * from "./prosemirrorHost";
export * from "./schema";
export * from "./tidyEditor";
export * from "./tidyLayer";
