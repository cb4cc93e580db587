export * from "./domains";
export * from "./measurements";
