/**
 * Google Drive access for invoice PDFs.
 *
 * The folder given by GOOGLE_DRIVE_FOLDER_ID is walked recursively; only
 * PDFs are yielded. Listing is lazy (one page request at a time) and each
 * page request is retried with backoff, since listing is idempotent.
 */

import { google, type drive_v3 } from "googleapis";
import type { GoogleAuthClient } from "@/lib/google/auth";
import type { FileDescriptor } from "@/lib/invoices/types";
import type { Logger } from "@/lib/utils/logger";
import { DownloadError, RemoteListError } from "@/lib/errors";
import { getErrorMessage, getHttpStatus, getProviderCode, isTransientError } from "@/lib/utils/error";
import { withRetry } from "@/lib/utils/retry";

export const PDF_MIME_TYPE = "application/pdf";
export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const LIST_FIELDS = "nextPageToken, files(id, name, mimeType, modifiedTime, size)";

/**
 * Create a Google Drive API client.
 */
export function createDriveClient(auth: GoogleAuthClient) {
  return google.drive({ version: "v3", auth });
}

export type DriveListPageParams = {
  folderId: string;
  pageSize: number;
  pageToken?: string;
};

/**
 * The two Drive calls the pipeline makes.
 */
export interface DriveFilesPort {
  listPage(params: DriveListPageParams): Promise<drive_v3.Schema$FileList>;
  download(fileId: string): Promise<Buffer>;
}

/**
 * The part of `drive.files` the port calls.
 */
export type DriveFilesApi = {
  list(
    params: drive_v3.Params$Resource$Files$List,
    options: { timeout: number }
  ): Promise<{ data: drive_v3.Schema$FileList }>;
  get(
    params: drive_v3.Params$Resource$Files$Get,
    options: { responseType: "stream"; timeout: number }
  ): Promise<{ data: AsyncIterable<Buffer | string> }>;
};

/**
 * Bind the port to `createDriveClient(auth).files`. Every request carries
 * the per-call timeout.
 */
export function createDrivePort(files: DriveFilesApi, timeoutMs: number): DriveFilesPort {
  return {
    async listPage({ folderId, pageSize, pageToken }) {
      const response = await files.list(
        {
          q: `'${folderId.replace(/'/g, "\\'")}' in parents and trashed=false`,
          fields: LIST_FIELDS,
          pageSize,
          pageToken,
          orderBy: "name",
          supportsAllDrives: true,
          includeItemsFromAllDrives: true,
        },
        { timeout: timeoutMs }
      );
      return response.data;
    },

    async download(fileId) {
      const response = await files.get(
        { fileId, alt: "media", supportsAllDrives: true },
        { responseType: "stream", timeout: timeoutMs }
      );

      const chunks: Buffer[] = [];
      for await (const chunk of response.data) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      return Buffer.concat(chunks);
    },
  };
}

export interface FileStore {
  listPdfFiles(rootFolderId: string): AsyncGenerator<FileDescriptor>;
  downloadFile(file: FileDescriptor): Promise<Buffer>;
}

export type DriveFileStoreOptions = {
  pageSize: number;
  listAttempts: number;
  retryBaseDelayMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
};

function toDescriptor(file: drive_v3.Schema$File, relativePath: string): FileDescriptor | null {
  if (!file.id || !file.name) return null;
  const size = file.size ? Number(file.size) : NaN;
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType ?? "",
    relativePath,
    modifiedTime: file.modifiedTime ?? null,
    size: Number.isFinite(size) ? size : null,
  };
}

export function createDriveFileStore(port: DriveFilesPort, options: DriveFileStoreOptions): FileStore {
  const { logger } = options;

  async function fetchPage(folderId: string, pageToken: string | undefined): Promise<drive_v3.Schema$FileList> {
    try {
      return await withRetry(() => port.listPage({ folderId, pageSize: options.pageSize, pageToken }), {
        attempts: options.listAttempts,
        baseDelayMs: options.retryBaseDelayMs,
        shouldRetry: isTransientError,
        sleep: options.sleep,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            `Listing folder ${folderId} failed (attempt ${attempt}/${options.listAttempts}), retrying in ${delayMs}ms: ${getErrorMessage(error)}`
          ),
      });
    } catch (error) {
      throw new RemoteListError(
        `Failed to list Drive folder ${folderId}: ${getErrorMessage(error)}`,
        { folderId, status: getHttpStatus(error), providerCode: getProviderCode(error) },
        { cause: error }
      );
    }
  }

  async function* walk(folderId: string, relativePath: string): AsyncGenerator<FileDescriptor> {
    let pageToken: string | undefined;
    const subfolders: Array<{ id: string; name: string }> = [];

    do {
      const page = await fetchPage(folderId, pageToken);
      for (const item of page.files ?? []) {
        if (item.mimeType === FOLDER_MIME_TYPE) {
          if (item.id && item.name) subfolders.push({ id: item.id, name: item.name });
          continue;
        }
        if (item.mimeType !== PDF_MIME_TYPE) {
          logger.debug(`Skipping non-PDF ${item.name ?? item.id} (${item.mimeType})`);
          continue;
        }
        const descriptor = toDescriptor(item, relativePath);
        if (descriptor) yield descriptor;
      }
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken);

    for (const folder of subfolders) {
      const childPath = relativePath ? `${relativePath}/${folder.name}` : folder.name;
      yield* walk(folder.id, childPath);
    }
  }

  return {
    listPdfFiles(rootFolderId) {
      logger.debug(`Walking Drive folder ${rootFolderId}`);
      return walk(rootFolderId, "");
    },

    async downloadFile(file) {
      try {
        const content = await port.download(file.id);
        if (content.length === 0) {
          throw new Error("Drive returned an empty file");
        }
        logger.debug(`Downloaded ${file.name} (${content.length} bytes)`);
        return content;
      } catch (error) {
        throw new DownloadError(
          `Failed to download ${file.name}: ${getErrorMessage(error)}`,
          { fileId: file.id, fileName: file.name, status: getHttpStatus(error), providerCode: getProviderCode(error) },
          { cause: error }
        );
      }
    },
  };
}
