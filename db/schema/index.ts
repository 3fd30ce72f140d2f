export * from "./chunks"
