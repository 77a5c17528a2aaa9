import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import {
  type MetadataBackendName,
  isMetadataBackendName,
  metadataBackendNames,
} from "./services/MetadataService";

const backendListPattern = `^\\s*(?:${metadataBackendNames.join("|")})\\s*(?:,\\s*(?:${metadataBackendNames.join("|")})\\s*)*$`;

export const appConfigSchema = t.Object({
  PHOTO_DB_PATH: t.String({ minLength: 1, default: "photo_database.json" }),
  METADATA_BACKENDS: t
    .Transform(
      t.String({ pattern: backendListPattern, default: metadataBackendNames.join(",") })
    )
    .Decode((value): MetadataBackendName[] =>
      value
        .split(",")
        .map((s) => s.trim())
        .filter(isMetadataBackendName)
    )
    .Encode((value) => value.join(",")),
  REPORT_DIR: t.String({ minLength: 1, default: "reports" }),
  EXIFTOOL_TASK_TIMEOUT_MS: t.Integer({ minimum: 1000, default: 20000 }),
});

export const getAppConfig = buildConfigFactoryEnv(appConfigSchema);
