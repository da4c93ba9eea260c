import {
  type FilenameParser,
  FilenameParserDefault,
} from "@/services/FilenameParser";
import {
  type FilenameValidator,
  FilenameValidatorDefault,
} from "@/services/FilenameValidator";
import {
  type MetadataFormatter,
  MetadataFormatterDefault,
} from "@/services/MetadataFormatter";

import type { FilenameInspector, Inspection } from "./FilenameInspector";

export class FilenameInspectorDefault implements FilenameInspector {
  constructor(
    private readonly parser: FilenameParser = new FilenameParserDefault(),
    private readonly validator: FilenameValidator = new FilenameValidatorDefault(),
    private readonly formatter: MetadataFormatter = new MetadataFormatterDefault()
  ) {}

  inspect(fileName: string): Inspection {
    const parsed = this.parser.parse(fileName);
    if (!parsed) return { status: "UNPARSEABLE", fileName };

    const issues = this.validator.validate(parsed);
    if (issues.length > 0) {
      return { status: "INVALID", fileName, parsed, issues };
    }

    return {
      status: "VALID",
      fileName,
      parsed,
      tags: this.formatter.buildTags(parsed),
    };
  }
}
