export * from "./environment";
export * from "./logs";
export { variables } from "./variables";
