import { randomUUID } from "node:crypto";

import { exactModifier } from "@/constants";
import type { ParsedFilename } from "@/services/FilenameParser";

import type { MetadataFormatter, MetadataTags } from "./MetadataFormatter";

const metadataFields = {
  identifiers: ["XMP-dc:Identifier", "XMP-xmpMM:DocumentID"],
  partialDate: "XMP-dc:Date",
  fullDateTime: "XMP-photoshop:DateCreated",
  numericDateTime: "ExifIFD:DateTimeOriginal",
} as const;

const pad = (n: number, length = 2) => String(n).padStart(length, "0");

export class MetadataFormatterDefault implements MetadataFormatter {
  constructor(private readonly generateId: () => string = randomUUID) {}

  formatPartialDate({ year, month, day }: ParsedFilename) {
    if (year === 0) return undefined;
    if (month === 0) return pad(year, 4);
    if (day === 0) return `${pad(year, 4)}-${pad(month)}`;
    return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
  }

  formatFullDateTime(parsed: ParsedFilename) {
    if (parsed.modifier !== exactModifier) return undefined;
    const { year, month, day, hour, minute, second } = parsed;
    return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
  }

  formatNumericDateTime(parsed: ParsedFilename) {
    if (parsed.modifier !== exactModifier) return undefined;
    const { year, month, day, hour, minute, second } = parsed;
    return `${pad(year, 4)}:${pad(month)}:${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
  }

  newIdentifier() {
    return this.generateId();
  }

  buildTags(parsed: ParsedFilename): MetadataTags {
    const tags: MetadataTags = {};

    const identifier = this.newIdentifier();
    for (const field of metadataFields.identifiers) {
      tags[field] = identifier;
    }

    const partialDate = this.formatPartialDate(parsed);
    if (partialDate) tags[metadataFields.partialDate] = partialDate;

    const fullDateTime = this.formatFullDateTime(parsed);
    if (fullDateTime) tags[metadataFields.fullDateTime] = fullDateTime;

    const numericDateTime = this.formatNumericDateTime(parsed);
    if (numericDateTime) tags[metadataFields.numericDateTime] = numericDateTime;

    return tags;
  }
}
