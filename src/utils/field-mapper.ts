/**
 * フィールドマッピングユーティリティ
 *
 * ソースAPIの応答（形が安定しない生レコード）から値を取り出す。
 * フィールドはドット区切りのパスで指定し、数値セグメントは配列の添字として扱う
 * 例: "errors.0.code", "body.xdmEntity.web.webPageDetails.URL"
 */

// =============================================================================
// 型ガード
// =============================================================================

/**
 * プレーンなオブジェクトか判定
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// フィールド値取得
// =============================================================================

/**
 * ドット区切りのパスで値を取得
 */
export function getPathValue(record: unknown, path: string): unknown {
  let current: unknown = record;
  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) {
        return undefined;
      }
      current = current[index];
    } else if (isPlainObject(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * 複数の候補パスから最初に見つかった値を取得
 */
export function getFieldValue(
  record: Record<string, unknown>,
  paths: readonly string[]
): unknown {
  for (const path of paths) {
    const value = getPathValue(record, path);
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * 文字列として値を取得（空文字・オブジェクトは未設定扱い）
 */
export function getString(
  record: Record<string, unknown>,
  paths: readonly string[]
): string | undefined {
  const value = getFieldValue(record, paths);
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/**
 * 配列として値を取得
 */
export function getArray(
  record: Record<string, unknown>,
  paths: readonly string[]
): unknown[] {
  const value = getFieldValue(record, paths);
  return Array.isArray(value) ? value : [];
}
