import { google, type drive_v3 } from "googleapis";
import { buffer } from "node:stream/consumers";
import { createLogger } from "../../utils/logger";
import type { CandidateItem, ImageQuery, PhotoStorage } from "../sync/types";

const log = createLogger("drive");

export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive.readonly"];

const LIST_FIELDS = "files(id, name, mimeType, webViewLink, modifiedTime)";

const quote = (value: string) => `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;

export function buildImageQuery(query: Pick<ImageQuery, "folderId" | "modifiedAfter">): string {
  return [
    query.folderId ? `${quote(query.folderId)} in parents` : null,
    "trashed = false",
    `modifiedTime > ${quote(query.modifiedAfter.toISOString())}`,
    "mimeType contains 'image/'",
  ]
    .filter((part): part is string => part !== null)
    .join(" and ");
}

export function toCandidate(file: drive_v3.Schema$File): CandidateItem | null {
  if (!file.id || !file.name) return null;
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType ?? "",
    modifiedTime: file.modifiedTime ?? "",
    viewUrl: file.webViewLink ?? undefined,
  };
}

export function createDriveStorage(keyFile: string): PhotoStorage {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: DRIVE_SCOPES });
  const drive = google.drive({ version: "v3", auth });

  return {
    async listImages(query) {
      const q = buildImageQuery(query);
      log.debug(`files.list q=${q}`);

      const res = await drive.files.list({
        q,
        fields: LIST_FIELDS,
        orderBy: "modifiedTime desc",
        pageSize: query.maxResults,
      });

      const items = (res.data.files ?? [])
        .map(toCandidate)
        .filter((item): item is CandidateItem => item !== null);
      log.info(`Found ${items.length} recent photos`);
      return items;
    },

    async downloadBytes(id) {
      log.debug(`Downloading file ${id}`);
      const res = await drive.files.get({ fileId: id, alt: "media" }, { responseType: "stream" });
      return buffer(res.data);
    },
  };
}
