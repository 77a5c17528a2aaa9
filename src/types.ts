import { type Static, Type as t } from "@sinclair/typebox";

export const fileRoleSchema = t.Union([
  t.Literal("primary"),
  t.Literal("raw"),
  t.Literal("sidecar"),
]);

export type FileRole = Static<typeof fileRoleSchema>;

export const fileFormatSchema = t.Union([
  t.Literal("jpeg"),
  t.Literal("heic"),
  t.Literal("other"),
  t.Literal("raw"),
  t.Literal("live_photo"),
  t.Literal("sidecar"),
]);

export type FileFormat = Static<typeof fileFormatSchema>;

export const fileHistoryEntrySchema = t.Object(
  {
    operation: t.Union([t.Literal("move"), t.Literal("copy")]),
    from: t.String({ minLength: 1 }),
    to: t.String({ minLength: 1 }),
    /** ISO 8601 */
    at: t.String(),
  },
  { additionalProperties: false }
);

export type FileHistoryEntry = Static<typeof fileHistoryEntrySchema>;

export const photoFileSchema = t.Object(
  {
    /** 絕對路徑 */
    path: t.String({ minLength: 1 }),
    role: fileRoleSchema,
    format: fileFormatSchema,
    /** 磁碟上的副檔名（保留大小寫），可能是複合副檔名如 `.CR2.xmp` */
    extension: t.String(),
    /** rename 留下的搬移/複製紀錄，依時間先後 */
    history: t.Optional(t.Array(fileHistoryEntrySchema)),
  },
  { additionalProperties: false }
);

export type PhotoFile = Static<typeof photoFileSchema>;

/**
 * 正規化後的中繼資料。欄位不存在代表「未知」，與空字串不同。
 */
export const metadataSchema = t.Object(
  {
    /** 拍攝時間（相機的牆上時間），格式 yyyy-MM-dd'T'HH:mm:ss */
    captureTime: t.Optional(t.String()),
    cameraMake: t.Optional(t.String()),
    cameraModel: t.Optional(t.String()),
    lensModel: t.Optional(t.String()),
    serialNumber: t.Optional(t.String()),
    iso: t.Optional(t.Number()),
    /** 光圈 f 值 */
    aperture: t.Optional(t.Number()),
    /** 焦距 (mm) */
    focalLength: t.Optional(t.Number()),
    /** 快門速度，如 `1/250`、`2` */
    shutterSpeed: t.Optional(t.String()),
  },
  { additionalProperties: false }
);

export type Metadata = Static<typeof metadataSchema>;

export type MetadataField = keyof Metadata;

export const metadataSourceSchema = t.Object(
  {
    path: t.String(),
    backend: t.String(),
  },
  { additionalProperties: false }
);

export type MetadataSource = Static<typeof metadataSourceSchema>;

export const photoGroupSchema = t.Object(
  {
    /** 不含副檔名的檔名 */
    key: t.String(),
    /** 所在目錄（絕對路徑）；分組範圍只限同一目錄 */
    directory: t.String(),
    /** 依發現順序排列，至少一個 */
    files: t.Array(photoFileSchema, { minItems: 1 }),
    metadata: metadataSchema,
    metadataSource: t.Optional(metadataSourceSchema),
    valid: t.Boolean(),
  },
  { additionalProperties: false }
);

export type PhotoGroup = Static<typeof photoGroupSchema>;

export type MoveFile = { from: string; to: string };
