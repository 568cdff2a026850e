export { CodedDataset } from "./store.js";
export type { DatasetEntry } from "./store.js";
