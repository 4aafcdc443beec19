export * from "./token";
export * from "./battle";
