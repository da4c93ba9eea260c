export * from "./FilenameInspector";
export * from "./FilenameInspectorDefault";
