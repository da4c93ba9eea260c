export * from "./FilenameValidator";
export * from "./FilenameValidatorDefault";
