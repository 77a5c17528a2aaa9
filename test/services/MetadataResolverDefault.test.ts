import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";
import { err, ok } from "~shared/utils/Result";

import {
  MetadataResolverDefault,
  applyResolution,
  selectMetadataSource,
} from "@/services/MetadataService";
import type { PhotoFile, PhotoGroup } from "@/types";

import { MetadataStrategyFake } from "~test/fakes/MetadataStrategyFake";

const jpg: PhotoFile = {
  path: "/photos/IMG_0001.JPG",
  role: "primary",
  format: "jpeg",
  extension: ".JPG",
};
const raw: PhotoFile = {
  path: "/photos/IMG_0001.CR3",
  role: "raw",
  format: "raw",
  extension: ".CR3",
};
const xmp: PhotoFile = {
  path: "/photos/IMG_0001.CR3.xmp",
  role: "sidecar",
  format: "sidecar",
  extension: ".CR3.xmp",
};

function buildGroup(files: PhotoFile[]): PhotoGroup {
  return { key: "IMG_0001", directory: "/photos", files, metadata: {}, valid: true };
}

function buildResolver(...strategies: MetadataStrategyFake[]) {
  return new MetadataResolverDefault({ strategies, logger: buildTestLogger() });
}

describe("selectMetadataSource", () => {
  test("RAW 優先於 JPEG，JPEG 優先於 sidecar", () => {
    expect(selectMetadataSource(buildGroup([xmp, jpg, raw]))).toBe(raw);
    expect(selectMetadataSource(buildGroup([xmp, jpg]))).toBe(jpg);
    expect(selectMetadataSource(buildGroup([xmp]))).toBe(xmp);
  });

  test("同角色取發現順序較前者", () => {
    const second: PhotoFile = { ...jpg, path: "/photos/IMG_0001.jpeg", extension: ".jpeg" };
    expect(selectMetadataSource(buildGroup([jpg, second]))).toBe(jpg);
  });
});

describe("MetadataResolverDefault", () => {
  test("從 RAW 讀取中繼資料", async () => {
    const exiftool = new MetadataStrategyFake("exiftool");
    exiftool.setMetadata(raw.path, {
      captureTime: "2024-03-15T10:20:30",
      cameraModel: "EOS R5",
    });

    const result = await buildResolver(exiftool).resolve(buildGroup([jpg, raw]));

    expectOk(result);
    expect(result.value).toEqual({
      metadata: { captureTime: "2024-03-15T10:20:30", cameraModel: "EOS R5" },
      source: { path: raw.path, backend: "exiftool" },
    });
    expect(exiftool.calls).toEqual([raw.path]);
  });

  test("前一個後端失敗時，結果完全來自下一個後端", async () => {
    const first = new MetadataStrategyFake("first");
    const second = new MetadataStrategyFake("second");
    first.setError(jpg.path, { type: "NO_METADATA", message: "empty" });
    second.setMetadata(jpg.path, { captureTime: "2024-03-15T10:20:30", iso: 200 });

    const result = await buildResolver(first, second).resolve(buildGroup([jpg]));

    expectOk(result);
    expect(result.value.metadata).toEqual({ captureTime: "2024-03-15T10:20:30", iso: 200 });
    expect(result.value.source.backend).toBe("second");
  });

  test("不支援該格式的後端不會被呼叫", async () => {
    const exifr = new MetadataStrategyFake("exifr", (file) => file.extension !== ".CR3");
    const exiftool = new MetadataStrategyFake("exiftool");
    exiftool.setMetadata(raw.path, { captureTime: "2024-03-15T10:20:30" });

    const result = await buildResolver(exifr, exiftool).resolve(buildGroup([raw]));

    expectOk(result);
    expect(exifr.calls).toEqual([]);
    expect(result.value.source.backend).toBe("exiftool");
  });

  test("後端擲出例外時改用下一個", async () => {
    const broken = new MetadataStrategyFake("broken");
    const fallback = new MetadataStrategyFake("filename");
    broken.setThrow(jpg.path, new Error("process crashed"));
    fallback.setMetadata(jpg.path, { captureTime: "2024-03-15T00:00:00" });

    const result = await buildResolver(broken, fallback).resolve(buildGroup([jpg]));

    expectOk(result);
    expect(result.value.metadata).toEqual({ captureTime: "2024-03-15T00:00:00" });
  });

  test("沒有拍攝時間的結果不會被採用", async () => {
    const shallow = new MetadataStrategyFake("shallow");
    const deep = new MetadataStrategyFake("deep");
    shallow.setMetadata(jpg.path, { cameraModel: "EOS R5" });
    deep.setMetadata(jpg.path, { captureTime: "2024-03-15T10:20:30" });

    const result = await buildResolver(shallow, deep).resolve(buildGroup([jpg]));

    expectOk(result);
    expect(result.value.metadata).toEqual({ captureTime: "2024-03-15T10:20:30" });
  });

  test("所有後端都失敗時回報每一次嘗試", async () => {
    const first = new MetadataStrategyFake("first");
    const second = new MetadataStrategyFake("second");
    const skipped = new MetadataStrategyFake("skipped", () => false);
    first.setError(raw.path, { type: "READ_FAILED", message: "timeout" });
    second.setMetadata(raw.path, { iso: 100 });

    const result = await buildResolver(first, skipped, second).resolve(buildGroup([jpg, raw]));

    expectErr(result);
    expect(result.error).toEqual({
      type: "EXTRACTION_FAILED",
      key: "IMG_0001",
      directory: "/photos",
      sourcePath: raw.path,
      attempts: [
        { backend: "first", reason: "READ_FAILED: timeout" },
        { backend: "second", reason: "沒有拍攝時間" },
      ],
      message: "所有後端都無法取得拍攝時間",
    });
  });

  test("沒有任何後端支援時", async () => {
    const none = new MetadataStrategyFake("none", () => false);
    const result = await buildResolver(none).resolve(buildGroup([xmp]));

    expectErr(result);
    expect(result.error.attempts).toEqual([]);
    expect(result.error.message).toBe("沒有後端支援 .CR3.xmp");
  });
});

describe("applyResolution", () => {
  test("成功時寫入 metadata 與來源", () => {
    const group = buildGroup([jpg]);
    const updated = applyResolution(
      group,
      ok({
        metadata: { captureTime: "2024-03-15T10:20:30" },
        source: { path: jpg.path, backend: "exifr" },
      })
    );
    expect(updated).toEqual({
      ...group,
      metadata: { captureTime: "2024-03-15T10:20:30" },
      metadataSource: { path: jpg.path, backend: "exifr" },
    });
  });

  test("失敗時清空 metadata 並移除來源", () => {
    const group: PhotoGroup = {
      ...buildGroup([jpg]),
      metadata: { iso: 100 },
      metadataSource: { path: jpg.path, backend: "exifr" },
    };
    const updated = applyResolution(
      group,
      err({
        type: "EXTRACTION_FAILED",
        key: group.key,
        directory: group.directory,
        sourcePath: jpg.path,
        attempts: [],
        message: "none",
      })
    );
    expect(updated).toEqual(buildGroup([jpg]));
    expect("metadataSource" in updated).toBe(false);
  });
});
