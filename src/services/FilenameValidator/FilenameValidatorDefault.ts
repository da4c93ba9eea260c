import { daysInMonth, validModifiers } from "@/constants";
import type { ParsedFilename } from "@/services/FilenameParser";

import type { FilenameValidator, ValidationIssue } from "./FilenameValidator";

const pad2 = (n: number) => String(n).padStart(2, "0");

type Rule = (parsed: ParsedFilename) => ValidationIssue[];

const checkModifier: Rule = ({ modifier }) => {
  if (validModifiers.some((m) => m === modifier)) return [];
  return [
    {
      rule: "MODIFIER",
      field: "modifier",
      value: modifier,
      message: `modifier 無效：'${modifier}'（須為 ${validModifiers.join(", ")} 其中之一）`,
    },
  ];
};

const checkDateRange: Rule = ({ month, day }) => {
  const issues: ValidationIssue[] = [];

  if (month < 0 || month > 12) {
    issues.push({
      rule: "DATE_RANGE",
      field: "month",
      value: month,
      message: `月份無效：${month}（須為 00-12）`,
    });
  }

  // 月份合法時依月份上限檢查，否則只檢查 31；二月固定 29，不判斷閏年
  const monthMax = month >= 1 && month <= 12 ? daysInMonth[month - 1] : undefined;
  if (monthMax !== undefined && day > 0) {
    if (day > monthMax) {
      issues.push({
        rule: "DATE_RANGE",
        field: "day",
        value: day,
        message: `日期無效：${day} 不在 ${month} 月範圍內（須為 00-${monthMax}）`,
      });
    }
  } else if (day < 0 || day > 31) {
    issues.push({
      rule: "DATE_RANGE",
      field: "day",
      value: day,
      message: `日期無效：${day}（須為 00-31）`,
    });
  }

  return issues;
};

const timeBounds = [
  ["hour", 23],
  ["minute", 59],
  ["second", 59],
] as const;

const checkTimeRange: Rule = (parsed) =>
  timeBounds
    .filter(([field, max]) => parsed[field] < 0 || parsed[field] > max)
    .map(([field, max]): ValidationIssue => ({
      rule: "TIME_RANGE",
      field,
      value: parsed[field],
      message: `${field} 無效：${parsed[field]}（須為 00-${max}）`,
    }));

const checkZeroCascade: Rule = ({ month, day, hour, minute, second }) => {
  const issues: ValidationIssue[] = [];
  const time = `${pad2(hour)}:${pad2(minute)}:${pad2(second)}`;
  const hasTime = hour !== 0 || minute !== 0 || second !== 0;

  if (month === 0 && day !== 0) {
    issues.push({
      rule: "ZERO_CASCADE",
      field: "day",
      value: day,
      message: `月份為 00 但日期為 ${pad2(day)}（月份為 00 時日期也必須為 00）`,
    });
  }
  if (month === 0 && hasTime) {
    issues.push({
      rule: "ZERO_CASCADE",
      field: "time",
      value: time,
      message: `月份為 00 但時間為 ${time}（月份為 00 時時間必須為 00:00:00）`,
    });
  }
  if (day === 0 && hasTime) {
    issues.push({
      rule: "ZERO_CASCADE",
      field: "time",
      value: time,
      message: `日期為 00 但時間為 ${time}（日期為 00 時時間必須為 00:00:00）`,
    });
  }
  if (hour === 0 && (minute !== 0 || second !== 0)) {
    issues.push({
      rule: "ZERO_CASCADE",
      field: "time",
      value: `${pad2(minute)}:${pad2(second)}`,
      message: `小時為 00 但分秒為 ${pad2(minute)}:${pad2(second)}（小時為 00 時分秒也必須為 00）`,
    });
  }
  if (minute === 0 && second !== 0) {
    issues.push({
      rule: "ZERO_CASCADE",
      field: "second",
      value: second,
      message: `分鐘為 00 但秒數為 ${pad2(second)}（分鐘為 00 時秒數也必須為 00）`,
    });
  }

  return issues;
};

const rules: readonly Rule[] = [
  checkModifier,
  checkDateRange,
  checkTimeRange,
  checkZeroCascade,
];

export class FilenameValidatorDefault implements FilenameValidator {
  validate(parsed: ParsedFilename): ValidationIssue[] {
    return rules.flatMap((rule) => rule(parsed));
  }
}
