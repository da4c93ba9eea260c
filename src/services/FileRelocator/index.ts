export * from "./FileRelocator";
export * from "./FileRelocatorDefault";
