import type { StaticDecode, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`設定值不正確:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * 建立從 `process.env` 讀取設定的 factory。
 * 每次呼叫都會重新讀取環境變數，方便測試時覆寫。
 */
export function buildConfigFactoryEnv<T extends TSchema>(
  schema: T,
  env: () => Record<string, string | undefined> = () => process.env
): () => StaticDecode<T> {
  return () => {
    const cleaned = Value.Clean(schema, { ...env() });
    const withDefaults = Value.Default(schema, cleaned);
    const converted = Value.Convert(schema, withDefaults);
    if (!Value.Check(schema, converted)) {
      const issues = [...Value.Errors(schema, converted)].map(
        (e) => `${e.path.replace(/^\//, "") || "(root)"}: ${e.message}`
      );
      throw new ConfigError(issues);
    }
    return Value.Decode(schema, converted);
  };
}
