import type { Metadata } from "@/types";

const EXIF_DATETIME_RE =
  /^(\d{4})[:-](\d{2})[:-](\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?/;

/**
 * 由年月日時分秒組出拍攝時間字串 yyyy-MM-dd'T'HH:mm:ss。
 * 以 UTC 驗證日期是否存在，避免受執行環境時區（夏令時間）影響。
 */
export function captureTimeFromParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): string | undefined {
  const parts = [year, month, day, hour, minute, second];
  if (!parts.every((n) => Number.isInteger(n))) return undefined;
  if (year < 1800) return undefined;
  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    d.getUTCFullYear() !== year ||
    d.getUTCMonth() !== month - 1 ||
    d.getUTCDate() !== day ||
    d.getUTCHours() !== hour ||
    d.getUTCMinutes() !== minute ||
    d.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${String(year).padStart(4, "0")}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * 解析 EXIF（`YYYY:MM:DD HH:mm:ss`）或 ISO 形式的時間字串。
 * 時區與次秒會被忽略，只保留相機的牆上時間。
 */
export function toCaptureTime(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const m = EXIF_DATETIME_RE.exec(value.trim());
  if (!m) return undefined;
  return captureTimeFromParts(
    Number(m[1]),
    Number(m[2]),
    Number(m[3]),
    m[4] === undefined ? 0 : Number(m[4]),
    m[5] === undefined ? 0 : Number(m[5]),
    m[6] === undefined ? 0 : Number(m[6])
  );
}

export function toText(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * 數值欄位：接受數字、`50.0 mm` 之類帶單位的字串，以及 [分子, 分母] 形式的有理數。
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value) && value.length === 2) {
    const [num, den] = value;
    if (typeof num === "number" && typeof den === "number" && den !== 0) {
      return toNumber(num / den);
    }
    return undefined;
  }
  if (typeof value === "string") {
    const m = /^\s*(-?\d+(?:\.\d+)?)(?:\s*\/\s*(\d+(?:\.\d+)?))?/.exec(value);
    if (!m) return undefined;
    const num = Number(m[1]);
    if (m[2] === undefined) return toNumber(num);
    const den = Number(m[2]);
    return den === 0 ? undefined : toNumber(num / den);
  }
  return undefined;
}

/**
 * 快門速度：小於 1 秒的數值轉成 `1/N` 形式。
 */
export function toShutterSpeed(value: unknown): string | undefined {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return undefined;
    if (value >= 1) return String(Math.round(value * 10) / 10);
    return `1/${Math.round(1 / value)}`;
  }
  return toText(value);
}

/** 去掉值為 undefined 的欄位 */
export function compactMetadata(metadata: Metadata): Metadata {
  return Object.fromEntries(
    Object.entries(metadata).filter(([, value]) => value !== undefined)
  );
}

/**
 * 依序取第一個有值的欄位。
 */
export function firstOf<T>(
  tags: ReadonlyMap<string, unknown>,
  keys: readonly string[],
  convert: (value: unknown) => T | undefined
): T | undefined {
  for (const key of keys) {
    const converted = convert(tags.get(key));
    if (converted !== undefined) return converted;
  }
  return undefined;
}
