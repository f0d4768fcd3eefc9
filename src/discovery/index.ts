export * from "./facets";
export * from "./priority";
export * from "./facetStatus";
export * from "./captchaRecovery";
export * from "./discoveryManager";
export * from "./batchDiscovery";
