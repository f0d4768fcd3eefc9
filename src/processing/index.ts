export * from "./raw";
export * from "./dates";
export * from "./responseProcessor";
