import {
  type StaticDecode,
  type TObject,
  type TProperties,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 環境變數中的布林值，接受 true/false/1/0（大小寫不拘）。
 */
export function envBoolean() {
  return t
    .Transform(t.String({ pattern: "^(?:[Tt][Rr][Uu][Ee]|[Ff][Aa][Ll][Ss][Ee]|1|0)$" }))
    .Decode((value) => ["true", "1"].includes(value.toLowerCase()))
    .Encode((value) => (value ? "true" : "false"));
}

export type ConfigSource = Record<string, string | undefined>;

/**
 * 以 typebox schema 描述設定，回傳讀取函式。
 * 讀取流程：只保留 schema 內的 key → 套用預設值 → 轉型 → 驗證並解碼。
 * 驗證失敗會直接拋出錯誤，讓程式在啟動時就中止。
 */
export function buildConfigFactory<T extends TProperties>(
  schema: TObject<T>,
  source: () => ConfigSource
): () => StaticDecode<TObject<T>> {
  return () => {
    const cleaned = Value.Clean(schema, { ...source() });
    const defaulted = Value.Default(schema, cleaned);
    const converted = Value.Convert(schema, defaulted);
    return Value.Decode(schema, converted);
  };
}

export function buildConfigFactoryEnv<T extends TProperties>(
  schema: TObject<T>
) {
  return buildConfigFactory(schema, () => process.env);
}
