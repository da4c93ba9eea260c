import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    /** JSON 報告輸出目錄，預設 dist/reports */
    REPORT_DIR: t.Optional(t.String()),
    EXIFTOOL_MIN_VERSION: t.Optional(envNumber()),
  })
);
