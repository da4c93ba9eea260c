export * from "./MetadataFormatter";
export * from "./MetadataFormatterDefault";
