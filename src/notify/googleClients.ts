/**
 * Google API クライアントの組み立て
 *
 * サービスアカウントJSON（GOOGLE_SERVICE_ACCOUNT_JSON）から認証し、
 * Sheets / Drive の配信先を作成する
 */

import { google } from "googleapis";
import { z } from "zod";
import { GOOGLE_API } from "../constants";
import { ConfigurationError } from "../errors";
import { GoogleChatSink } from "./googleChatSink";
import { GoogleSheetsSink, SheetsAppender } from "./googleSheetsSink";
import { DriveUploader, GoogleDriveSink } from "./googleDriveSink";
import { SinkRegistry } from "./types";

const ServiceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
  project_id: z.string().optional(),
});

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

export function parseServiceAccountJson(json: string): ServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new ConfigurationError("GOOGLE_SERVICE_ACCOUNT_JSON is not valid JSON");
  }
  const result = ServiceAccountSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      "GOOGLE_SERVICE_ACCOUNT_JSON is not a service account key",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

function createAuth(credentials: ServiceAccountCredentials) {
  return new google.auth.GoogleAuth({
    credentials,
    scopes: [...GOOGLE_API.SCOPES],
  });
}

export function createSheetsAppender(credentials: ServiceAccountCredentials): SheetsAppender {
  const sheets = google.sheets({ version: "v4", auth: createAuth(credentials) });
  return {
    async append(request, signal) {
      await sheets.spreadsheets.values.append(
        {
          spreadsheetId: request.spreadsheetId,
          range: request.range,
          valueInputOption: "RAW",
          insertDataOption: "INSERT_ROWS",
          requestBody: { values: request.values },
        },
        { signal }
      );
    },
  };
}

export function createDriveUploader(credentials: ServiceAccountCredentials): DriveUploader {
  const drive = google.drive({ version: "v3", auth: createAuth(credentials) });
  return {
    async upload(request, signal) {
      const response = await drive.files.create(
        {
          requestBody: {
            name: request.name,
            parents: [request.folderId],
            mimeType: request.mimeType,
          },
          media: { mimeType: request.mimeType, body: request.content },
          fields: "id",
          supportsAllDrives: true,
        },
        { signal }
      );
      return response.data.id ?? undefined;
    },
  };
}

/**
 * 配信先の実装一式を作成する
 *
 * サービスアカウント未設定の場合、Sheets / Drive は登録しない
 * （該当する配信先は配信時に失敗として記録される）
 */
export function createSinkRegistry(serviceAccountJson?: string): SinkRegistry {
  const registry: SinkRegistry = { google_chat: new GoogleChatSink() };
  if (!serviceAccountJson) {
    return registry;
  }

  const credentials = parseServiceAccountJson(serviceAccountJson);
  registry.google_sheets = new GoogleSheetsSink(createSheetsAppender(credentials));
  registry.google_drive = new GoogleDriveSink(createDriveUploader(credentials));
  return registry;
}
