export * from "./errors";
export * from "./path-template";
export * from "./policy";
export * from "./scanner";
export * from "./reconcile";
export * from "./actions";
export * from "./store";
export * from "./config";
export * from "./snapshot";
