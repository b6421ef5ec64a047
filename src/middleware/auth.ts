/**
 * 取込監視ジョブ - 認証ミドルウェア
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../logger";

/**
 * 認証エラーレスポンス
 */
interface AuthErrorResponse {
  error: string;
  message: string;
}

function extractBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization || !authorization.startsWith("Bearer ")) {
    return undefined;
  }
  const token = authorization.slice("Bearer ".length).trim();
  return token.length > 0 ? token : undefined;
}

function extractApiKeyHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 */
export function apiKeyAuth(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      // API Keyが設定されていない場合は認証をスキップ
      logger.warn("API Key authentication is disabled (API_KEY not set)");
      next();
      return;
    }

    const providedKey =
      extractApiKeyHeader(req.headers["x-api-key"]) ||
      extractBearerToken(req.headers.authorization);

    if (!providedKey) {
      const response: AuthErrorResponse = {
        error: "Unauthorized",
        message: "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>",
      };
      res.status(401).json(response);
      return;
    }

    if (providedKey !== apiKey) {
      logger.warn("Invalid API key attempt", {
        ip: req.ip,
        path: req.path,
      });
      const response: AuthErrorResponse = {
        error: "Unauthorized",
        message: "Invalid API key",
      };
      res.status(401).json(response);
      return;
    }

    next();
  };
}
