export * from "./FilenameParser";
export * from "./FilenameParserDefault";
