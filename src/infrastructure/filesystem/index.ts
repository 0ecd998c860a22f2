export * from "./atomic-operations";
export { ExportWriter, formatJson } from "./export-writer";
export * from "./types";
export * from "./archive";
