import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import { ConfigError, buildConfigFactoryEnv } from "~shared/ConfigFactory";

const schema = t.Object({
  NAME: t.String({ default: "photos" }),
  PORT: t.Integer({ minimum: 1 }),
  LIMIT: t.Optional(t.Integer()),
});

describe("buildConfigFactoryEnv", () => {
  test("套用預設值並轉換型別", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({ PORT: "8080", LIMIT: "5" }));
    expect(getConfig()).toEqual({ NAME: "photos", PORT: 8080, LIMIT: 5 });
  });

  test("忽略 schema 以外的變數", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({
      PORT: "1",
      HOME: "/home/test",
    }));
    expect(getConfig()).toEqual({ NAME: "photos", PORT: 1 });
  });

  test("每次呼叫重新讀取環境變數", () => {
    const env: Record<string, string | undefined> = { PORT: "1" };
    const getConfig = buildConfigFactoryEnv(schema, () => env);
    expect(getConfig().PORT).toBe(1);
    env.PORT = "2";
    expect(getConfig().PORT).toBe(2);
  });

  test("不合法時擲出 ConfigError 並列出所有問題", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({ LIMIT: "maybe" }));
    let caught: unknown;
    try {
      getConfig();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.some((i) => i.startsWith("PORT:"))).toBe(true);
      expect(caught.issues.some((i) => i.startsWith("LIMIT:"))).toBe(true);
    }
  });
});
