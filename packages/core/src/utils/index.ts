export * from "./paths";
export * from "./shell";
