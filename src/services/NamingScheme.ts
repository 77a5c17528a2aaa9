import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Metadata, MetadataField, PhotoGroup } from "@/types";

type PlaceholderDefinition =
  | { kind: "date"; pattern: string }
  | { kind: "field"; field: Exclude<MetadataField, "captureTime"> }
  | { kind: "basename" }
  | { kind: "sequence" };

const placeholders = {
  date: { kind: "date", pattern: "yyyy-MM-dd" },
  datetime: { kind: "date", pattern: "yyyy-MM-dd_HH-mm-ss" },
  year: { kind: "date", pattern: "yyyy" },
  month: { kind: "date", pattern: "MM" },
  day: { kind: "date", pattern: "dd" },
  hour: { kind: "date", pattern: "HH" },
  minute: { kind: "date", pattern: "mm" },
  second: { kind: "date", pattern: "ss" },
  camera_make: { kind: "field", field: "cameraMake" },
  camera_model: { kind: "field", field: "cameraModel" },
  lens_model: { kind: "field", field: "lensModel" },
  serial_number: { kind: "field", field: "serialNumber" },
  iso: { kind: "field", field: "iso" },
  aperture: { kind: "field", field: "aperture" },
  focal_length: { kind: "field", field: "focalLength" },
  shutter_speed: { kind: "field", field: "shutterSpeed" },
  basename: { kind: "basename" },
  sequence: { kind: "sequence" },
} as const satisfies Record<string, PlaceholderDefinition>;

export type PlaceholderName = keyof typeof placeholders;

export const placeholderNames = Object.keys(placeholders).filter(isPlaceholderName);

function isPlaceholderName(name: string): name is PlaceholderName {
  return Object.hasOwn(placeholders, name);
}

export type SchemeNode =
  | { kind: "literal"; text: string }
  | { kind: "placeholder"; name: PlaceholderName; directive?: string };

export type NamingScheme = {
  readonly source: string;
  readonly nodes: readonly SchemeNode[];
  readonly hasSequence: boolean;
};

export type SchemeCollision = {
  /** 不含序號的目標路徑，序號位置以 `{sequence}` 表示 */
  path: string;
  /** 撞名群組的目錄 + 檔名 */
  groups: string[];
};

export type SchemeValidationError =
  | { type: "INVALID_SCHEME"; scheme: string; message: string }
  | {
      type: "UNRESOLVED_COLLISION";
      scheme: string;
      message: string;
      collisions: SchemeCollision[];
    };

/** 缺少欄位時的替代字串 */
export const MISSING_VALUE = "unknown";

export const MIN_SEQUENCE_DIGITS = 1;
export const MAX_SEQUENCE_DIGITS = 6;
export const DEFAULT_SEQUENCE_DIGITS = 3;

/** 序號在「撞名判斷用路徑」中的佔位字元 */
export const SEQUENCE_MARKER = "\u0000";

const PLACEHOLDER_NAME_RE = /^[a-z_]+$/;

function invalid(scheme: string, message: string): Result<never, SchemeValidationError> {
  return err({ type: "INVALID_SCHEME", scheme, message });
}

export function isValidSequenceDigits(digits: number): boolean {
  return (
    Number.isInteger(digits) &&
    digits >= MIN_SEQUENCE_DIGITS &&
    digits <= MAX_SEQUENCE_DIGITS
  );
}

/**
 * 解析命名規則，例如 `{year}/{date}_{camera_model}_{sequence:4}`。
 * - `{name}` 或 `{name:directive}`
 * - `{{`、`}}` 代表字面的大括號
 * - `/` 分隔目錄
 */
export function parseNamingScheme(
  source: string
): Result<NamingScheme, SchemeValidationError> {
  const nodes: SchemeNode[] = [];
  let literal = "";
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === "{" && next === "{") {
      literal += "{";
      i += 2;
      continue;
    }
    if (ch === "}" && next === "}") {
      literal += "}";
      i += 2;
      continue;
    }
    if (ch === "}") {
      return invalid(source, `第 ${i + 1} 個字元的 } 沒有對應的 {`);
    }
    if (ch !== "{") {
      if (/[\u0000-\u001f\u007f]/.test(ch)) {
        return invalid(source, `第 ${i + 1} 個字元是控制字元`);
      }
      literal += ch;
      i += 1;
      continue;
    }

    const close = source.indexOf("}", i + 1);
    const nested = source.indexOf("{", i + 1);
    if (close < 0 || (nested >= 0 && nested < close)) {
      return invalid(source, `第 ${i + 1} 個字元的 { 沒有結束`);
    }

    const body = source.slice(i + 1, close);
    const colon = body.indexOf(":");
    const name = colon < 0 ? body : body.slice(0, colon);
    const directive = colon < 0 ? undefined : body.slice(colon + 1);

    if (!PLACEHOLDER_NAME_RE.test(name) || !isPlaceholderName(name)) {
      return invalid(
        source,
        `未知的欄位 {${name}}，可用欄位: ${placeholderNames.join(", ")}`
      );
    }
    const directiveError = checkDirective(name, directive);
    if (directiveError) return invalid(source, directiveError);

    if (literal) {
      nodes.push({ kind: "literal", text: literal });
      literal = "";
    }
    nodes.push(
      directive === undefined
        ? { kind: "placeholder", name }
        : { kind: "placeholder", name, directive }
    );
    i = close + 1;
  }
  if (literal) nodes.push({ kind: "literal", text: literal });

  if (!nodes.some((node) => node.kind === "placeholder")) {
    return invalid(source, "命名規則至少需要一個欄位");
  }

  const pathError = checkPathSegments(nodes);
  if (pathError) return invalid(source, pathError);

  return ok({
    source,
    nodes,
    hasSequence: nodes.some(
      (node) => node.kind === "placeholder" && node.name === "sequence"
    ),
  });
}

function checkDirective(
  name: PlaceholderName,
  directive: string | undefined
): string | undefined {
  if (directive === undefined) return undefined;
  const definition: PlaceholderDefinition = placeholders[name];
  switch (definition.kind) {
    case "sequence": {
      const digits = Number(directive);
      if (!/^\d+$/.test(directive) || !isValidSequenceDigits(digits)) {
        return `{sequence} 的位數必須是 ${MIN_SEQUENCE_DIGITS} 到 ${MAX_SEQUENCE_DIGITS}，收到 "${directive}"`;
      }
      return undefined;
    }
    case "date": {
      if (directive === "") return `{${name}:} 缺少日期格式`;
      try {
        format(new UTCDate(2000, 0, 1), directive);
        return undefined;
      } catch (e) {
        return `{${name}:${directive}} 不是合法的日期格式: ${e instanceof Error ? e.message : String(e)}`;
      }
    }
    default:
      return `{${name}} 不接受格式參數`;
  }
}

/**
 * 目標必須是相對路徑，且不能有空的、`.`、`..` 目錄段。
 * 只要目錄段含有欄位就放行，欄位值會經過 sanitize，不會產生 `/`。
 */
function checkPathSegments(nodes: readonly SchemeNode[]): string | undefined {
  const first = nodes[0];
  if (first?.kind === "literal" && (/^[/\\]/.test(first.text) || /^[A-Za-z]:/.test(first.text))) {
    return "命名規則必須是相對路徑";
  }

  const segments: { text: string; hasPlaceholder: boolean }[] = [
    { text: "", hasPlaceholder: false },
  ];
  for (const node of nodes) {
    if (node.kind === "placeholder") {
      segments[segments.length - 1].hasPlaceholder = true;
      continue;
    }
    const parts = node.text.split("/");
    segments[segments.length - 1].text += parts[0];
    for (const part of parts.slice(1)) {
      segments.push({ text: part, hasPlaceholder: false });
    }
  }

  for (const segment of segments) {
    if (segment.hasPlaceholder) continue;
    if (segment.text === "" || segment.text === "." || segment.text === "..") {
      return `命名規則含有不合法的路徑段 "${segment.text}"`;
    }
  }
  return undefined;
}

/**
 * 列出命名規則會用到的中繼資料欄位。
 */
export function requiredFields(scheme: NamingScheme): MetadataField[] {
  const fields = new Set<MetadataField>();
  for (const node of scheme.nodes) {
    if (node.kind !== "placeholder") continue;
    const definition: PlaceholderDefinition = placeholders[node.name];
    if (definition.kind === "date") fields.add("captureTime");
    if (definition.kind === "field") fields.add(definition.field);
  }
  return [...fields];
}

export function missingFields(scheme: NamingScheme, metadata: Metadata): MetadataField[] {
  return requiredFields(scheme).filter((field) => metadata[field] === undefined);
}

/**
 * 將欄位值轉為安全的檔名片段。
 */
export function sanitizeValue(value: string): string {
  return value
    .replace(/[<>:"/\\|?*\u0000-\u001f\u007f]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[\s_.]+|[\s_.]+$/g, "");
}

/**
 * 拍攝時間是不帶時區的牆上時間，以 UTC 建立與格式化，結果不受主機時區影響。
 */
function captureDate(captureTime: string): UTCDate | undefined {
  const m = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/.exec(captureTime);
  if (!m) return undefined;
  const date = new UTCDate(
    Number(m[1]),
    Number(m[2]) - 1,
    Number(m[3]),
    Number(m[4]),
    Number(m[5]),
    Number(m[6])
  );
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function formatFieldValue(value: string | number): string {
  return typeof value === "number" ? String(value) : value;
}

function renderPlaceholder(
  node: Extract<SchemeNode, { kind: "placeholder" }>,
  group: Pick<PhotoGroup, "key" | "metadata">
): string {
  const definition: PlaceholderDefinition = placeholders[node.name];
  let value: string | undefined;
  switch (definition.kind) {
    case "date": {
      const date =
        group.metadata.captureTime === undefined
          ? undefined
          : captureDate(group.metadata.captureTime);
      value = date ? format(date, node.directive ?? definition.pattern) : undefined;
      break;
    }
    case "field": {
      const raw = group.metadata[definition.field];
      value = raw === undefined ? undefined : formatFieldValue(raw);
      break;
    }
    case "basename":
      value = group.key;
      break;
    case "sequence":
      return SEQUENCE_MARKER;
  }
  const sanitized = value === undefined ? "" : sanitizeValue(value);
  return sanitized === "" ? MISSING_VALUE : sanitized;
}

/**
 * 套用命名規則，序號以 SEQUENCE_MARKER 佔位。
 * 結果相同的群組屬於同一個撞名桶。
 */
export function renderWithoutSequence(
  scheme: NamingScheme,
  group: Pick<PhotoGroup, "key" | "metadata">
): string {
  return scheme.nodes
    .map((node) =>
      node.kind === "literal" ? node.text : renderPlaceholder(node, group)
    )
    .join("");
}

/**
 * 將佔位的序號換成實際數字。每個 `{sequence}` 可以用自己的位數。
 */
export function fillSequence(
  scheme: NamingScheme,
  rendered: string,
  sequence: number,
  defaultDigits: number
): string {
  const widths = scheme.nodes.flatMap((node) =>
    node.kind === "placeholder" && node.name === "sequence"
      ? [node.directive === undefined ? defaultDigits : Number(node.directive)]
      : []
  );
  let index = 0;
  return rendered.replace(/\u0000/g, () => {
    const width = widths[index] ?? defaultDigits;
    index += 1;
    return String(sequence).padStart(width, "0");
  });
}
