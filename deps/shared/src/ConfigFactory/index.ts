import {
  type StaticDecode,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 以 TypeBox schema 解析環境變數。
 * 每次呼叫都重新讀取 process.env，解析失敗時拋出 TransformDecodeCheckError。
 */
export function buildConfigFactoryEnv<T extends TObject>(schema: T) {
  return (env: NodeJS.ProcessEnv = process.env): StaticDecode<T> => {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      // 空字串視同未設定
      if (value !== undefined && value !== "") picked[key] = value;
    }
    return Value.Decode(schema, picked);
  };
}

/** "true" / "1" / "yes" 為真，"false" / "0" / "no" 為假 */
export function envBoolean() {
  return t
    .Transform(
      t.Union([
        t.Literal("true"),
        t.Literal("false"),
        t.Literal("1"),
        t.Literal("0"),
        t.Literal("yes"),
        t.Literal("no"),
      ])
    )
    .Decode((v) => v === "true" || v === "1" || v === "yes")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

export function envNumber() {
  return t
    .Transform(t.String({ pattern: "^-?\\d+(\\.\\d+)?$" }))
    .Decode((v) => Number(v))
    .Encode((v) => String(v));
}
