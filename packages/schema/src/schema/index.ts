export * from "./validation";
export * from "./format-zod-issues";
