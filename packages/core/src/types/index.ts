export * from "./site";
export * from "./command";
export * from "./lifecycle";
