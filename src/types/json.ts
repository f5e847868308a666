/**
 * JSON 通用类型定义。
 *
 * 关键点（中文）
 * - 请求体、响应体与配置值在模块之间统一使用 JsonValue 传递。
 * - 避免在业务代码中使用宽泛断言，解析后先做类型收窄。
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];

export type JsonObject = {
  [key: string]: JsonValue;
};

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
