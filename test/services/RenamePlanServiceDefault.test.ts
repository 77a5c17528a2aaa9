import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { type NamingScheme, parseNamingScheme } from "@/services/NamingScheme";
import { RenamePlanServiceDefault } from "@/services/RenamePlanServiceDefault";
import type { Metadata, PhotoFile, PhotoGroup } from "@/types";

import { FileOperatorMemory } from "~test/fakes/FileOperatorMemory";

// ---- 測試共同工具 ----
function file(directory: string, name: string): PhotoFile {
  const ext = name.slice(name.indexOf("."));
  const lower = ext.toLowerCase();
  const role = lower === ".cr2" || lower === ".nef" ? "raw" : lower === ".xmp" ? "sidecar" : "primary";
  return {
    path: `${directory}/${name}`,
    role,
    format: role === "raw" ? "raw" : role === "sidecar" ? "sidecar" : "jpeg",
    extension: ext,
  };
}

function group(directory: string, key: string, exts: string[], metadata: Metadata): PhotoGroup {
  const files = exts.map((ext) => file(directory, `${key}${ext}`));
  return { key, directory, files, metadata, valid: true };
}

function scheme(text: string): NamingScheme {
  const result = parseNamingScheme(text);
  expectOk(result);
  return result.value;
}

function buildContext(groups: PhotoGroup[]) {
  const fileOperator = new FileOperatorMemory(groups.flatMap((g) => g.files.map((f) => f.path)));
  const service = new RenamePlanServiceDefault({ fileOperator, logger: buildTestLogger() });
  return { fileOperator, service };
}

const r5: Metadata = { captureTime: "2024-03-15T10:20:30", cameraModel: "EOS R5" };

describe("RenamePlanServiceDefault", () => {
  test("RAW 與 JPEG 共用同一個目標檔名，保留各自的副檔名", async () => {
    const groups = [group("/src", "IMG_001", [".cr2", ".jpg"], { ...r5, captureTime: "2024-03-15T00:00:00" })];
    const { service } = buildContext(groups);

    const result = await service.plan(groups, scheme("{date}_{camera_model}_{sequence}"), {
      destination: "/dest",
    });

    expectOk(result);
    expect(result.value.entries).toEqual([
      {
        group: groups[0],
        relativePath: "2024-03-15_EOS R5_001",
        sequence: 1,
        operations: [
          { from: "/src/IMG_001.cr2", to: "/dest/2024-03-15_EOS R5_001.cr2" },
          { from: "/src/IMG_001.jpg", to: "/dest/2024-03-15_EOS R5_001.jpg" },
        ],
        missingFiles: [],
      },
    ]);
    expect(result.value.skipped).toEqual([]);
  });

  test("同一個桶內依發現順序編號 1..N，不同桶各自從 1 開始", async () => {
    const groups = [
      group("/src", "A", [".jpg"], r5),
      group("/src", "B", [".jpg"], { ...r5, cameraModel: "Z 6" }),
      group("/src", "C", [".jpg"], r5),
      group("/src/sub", "A", [".jpg"], r5),
    ];
    const { service } = buildContext(groups);

    const result = await service.plan(groups, scheme("{camera_model}/{date}_{sequence:2}"), {
      destination: "/dest",
    });

    expectOk(result);
    expect(result.value.entries.map((e) => [e.group.key, e.relativePath, e.sequence])).toEqual([
      ["A", "EOS R5/2024-03-15_01", 1],
      ["B", "Z 6/2024-03-15_01", 1],
      ["C", "EOS R5/2024-03-15_02", 2],
      ["A", "EOS R5/2024-03-15_03", 3],
    ]);
  });

  test("sequenceDigits 設定預設位數", async () => {
    const groups = [group("/src", "A", [".jpg"], r5)];
    const { service } = buildContext(groups);

    const result = await service.plan(groups, scheme("{date}_{sequence}"), {
      destination: "/dest",
      sequenceDigits: 5,
    });

    expectOk(result);
    expect(result.value.entries[0].relativePath).toBe("2024-03-15_00001");
  });

  test("序號位數超出範圍時拒絕", async () => {
    const { service } = buildContext([]);
    const result = await service.plan([], scheme("{date}_{sequence}"), {
      destination: "/dest",
      sequenceDigits: 7,
    });

    expectErr(result);
    expect(result.error.type).toBe("INVALID_SCHEME");
  });

  test("沒有 {sequence} 卻撞名時回報所有撞名的桶", async () => {
    const groups = [
      group("/src", "A", [".jpg"], r5),
      group("/src", "B", [".jpg"], r5),
      group("/src", "C", [".jpg"], { ...r5, captureTime: "2024-03-16T09:00:00" }),
    ];
    const { service, fileOperator } = buildContext(groups);

    const result = await service.plan(groups, scheme("{date}_{camera_model}"), {
      destination: "/dest",
    });

    expectErr(result);
    expect(result.error).toEqual({
      type: "UNRESOLVED_COLLISION",
      scheme: "{date}_{camera_model}",
      message: "1 個目標路徑有多個群組，請在命名規則中加入 {sequence}",
      collisions: [{ path: "2024-03-15_EOS R5", groups: ["/src/A", "/src/B"] }],
    });
    expect(fileOperator.mutations).toEqual([]);
  });

  test("include 模式下缺少欄位以 unknown 代替，撞名仍然失敗", async () => {
    const groups = [
      group("/src", "A", [".jpg"], { captureTime: "2024-03-15T10:00:00" }),
      group("/src", "B", [".jpg"], { captureTime: "2024-03-15T11:00:00" }),
    ];
    const { service, fileOperator } = buildContext(groups);

    const result = await service.plan(groups, scheme("{date}_{lens_model}"), {
      destination: "/dest",
      invalidPolicy: "include",
    });

    expectErr(result);
    expect(result.error.type).toBe("UNRESOLVED_COLLISION");
    if (result.error.type === "UNRESOLVED_COLLISION") {
      expect(result.error.collisions).toEqual([
        { path: "2024-03-15_unknown", groups: ["/src/A", "/src/B"] },
      ]);
    }
    expect(fileOperator.mutations).toEqual([]);
  });

  test("skip 模式略過缺少欄位或沒有影像檔的群組", async () => {
    const groups = [
      group("/src", "A", [".jpg"], r5),
      group("/src", "B", [".jpg"], { captureTime: "2024-03-15T10:00:00" }),
      group("/src", "C", [".xmp"], r5),
    ];
    const { service } = buildContext(groups);

    const result = await service.plan(groups, scheme("{date}_{camera_model}"), {
      destination: "/dest",
    });

    expectOk(result);
    expect(result.value.entries.map((e) => e.group.key)).toEqual(["A"]);
    expect(
      result.value.skipped.map((s) => [s.group.key, s.reason, s.missingFields])
    ).toEqual([
      ["B", "MISSING_FIELDS", ["cameraModel"]],
      ["C", "NO_IMAGE", undefined],
    ]);
  });

  test("include 模式保留沒有影像檔的群組", async () => {
    const groups = [group("/src", "C", [".xmp"], r5)];
    const { service } = buildContext(groups);

    const result = await service.plan(groups, scheme("{date}_{basename}"), {
      destination: "/dest",
      invalidPolicy: "include",
    });

    expectOk(result);
    expect(result.value.entries.map((e) => e.relativePath)).toEqual(["2024-03-15_C"]);
  });

  test("檔案都已不存在的群組一律略過，部分不存在時只處理存在的檔案", async () => {
    const gone = group("/src", "GONE", [".jpg"], r5);
    const partial = group("/src", "PART", [".cr2", ".jpg"], r5);
    const fileOperator = new FileOperatorMemory(["/src/PART.jpg"]);
    const service = new RenamePlanServiceDefault({ fileOperator, logger: buildTestLogger() });

    const result = await service.plan([gone, partial], scheme("{basename}_{date}"), {
      destination: "/dest",
      invalidPolicy: "include",
    });

    expectOk(result);
    expect(result.value.skipped.map((s) => [s.group.key, s.reason])).toEqual([
      ["GONE", "FILES_MISSING"],
    ]);
    expect(result.value.entries).toEqual([
      {
        group: partial,
        relativePath: "PART_2024-03-15",
        operations: [{ from: "/src/PART.jpg", to: "/dest/PART_2024-03-15.jpg" }],
        missingFiles: ["/src/PART.cr2"],
      },
    ]);
  });

  test("不同桶填入序號後撞名時失敗", async () => {
    // 桶 "X{sequence}" 的第 11 個與桶 "X1{sequence}" 的第 1 個都是 X11
    const groups: PhotoGroup[] = [
      ...Array.from({ length: 11 }, (_, i) =>
        group("/src", `P${i}`, [".jpg"], { ...r5, cameraModel: "X" })
      ),
      group("/src", "Q", [".jpg"], { ...r5, cameraModel: "X1" }),
    ];
    const { service } = buildContext(groups);

    const result = await service.plan(groups, scheme("{camera_model}{sequence:1}"), {
      destination: "/dest",
    });

    expectErr(result);
    expect(result.error.type).toBe("UNRESOLVED_COLLISION");
    if (result.error.type === "UNRESOLVED_COLLISION") {
      expect(result.error.collisions).toEqual([
        { path: "/dest/X11.jpg", groups: ["/src/P10", "/src/Q"] },
      ]);
    }
  });

  test("規劃不會修改檔案系統", async () => {
    const groups = [group("/src", "A", [".jpg"], r5)];
    const { service, fileOperator } = buildContext(groups);

    await service.plan(groups, scheme("{date}_{sequence}"), { destination: "/dest" });

    expect(fileOperator.mutations).toEqual([]);
  });
});
