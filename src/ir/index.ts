export * from "./value";
export { irEquals } from "./equals";
