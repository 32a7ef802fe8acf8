export * from "./records";
export * from "./actions";
export * from "./config";
