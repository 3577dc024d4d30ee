import { type ApiClient, ENDPOINTS, isRecord } from "../backend/api-client.js";
import { encodeContent, isBase64 } from "../catalog/task-content.js";
import { BackendError, TimeoutError, UploadError, ValidationError } from "../errors.js";

export type ContentEncoding = "utf-8" | "base64";

export type UploadRequest = {
  ruleName: string;
  fileName: string;
  content: string;
  encoding?: ContentEncoding;
};

export type UploadResult = {
  file_url: string;
  filename: string;
  file_size: number;
};

// The stored file's hash is the last path segment of the URL the backend returns.
export function fileHashFromUrl(url: string): string {
  const path = url.split(/[?#]/)[0] ?? "";
  return path.split("/").filter(Boolean).pop() ?? "";
}

export class FileUploader {
  constructor(private readonly api: ApiClient) {}

  async upload(request: UploadRequest): Promise<UploadResult> {
    const ruleName = request.ruleName.trim();
    const fileName = request.fileName.trim();
    if (!ruleName) throw new ValidationError("Rule name is required to upload a file");
    if (!fileName) throw new ValidationError("File name is required to upload a file");

    const encoding = request.encoding ?? "utf-8";
    let fileContent: string;
    let fileSize: number;
    if (encoding === "base64") {
      const compact = request.content.replace(/\s+/g, "");
      if (!isBase64(compact)) {
        throw new ValidationError("Content is not valid base64", [], { content_encoding: encoding });
      }
      fileContent = compact;
      fileSize = Buffer.from(compact, "base64").length;
    } else {
      if (!request.content) throw new ValidationError("File content is empty");
      fileContent = encodeContent(request.content);
      fileSize = Buffer.byteLength(request.content, "utf8");
    }

    let response: unknown;
    try {
      response = await this.api.post(ENDPOINTS.uploadFile, { fileName, fileContent, ruleName });
    } catch (error) {
      if (error instanceof BackendError || error instanceof TimeoutError) {
        throw new UploadError(`File upload failed: ${error.message}`);
      }
      throw error;
    }

    const url = isRecord(response) ? response.fileURL : undefined;
    if (typeof url !== "string" || !url) {
      throw new UploadError("Unable to find the uploaded file URL");
    }
    return { file_url: url, filename: fileName, file_size: fileSize };
  }

  async fetchContent(hash: string): Promise<string> {
    const key = hash.trim();
    if (!key) throw new ValidationError("File hash is required");
    const response = await this.api.get(`${ENDPOINTS.files}/${encodeURIComponent(key)}`);
    const content = isRecord(response) ? response.FileContent : undefined;
    if (typeof content !== "string") {
      throw new BackendError(`File ${key} has no content`);
    }
    return Buffer.from(content, "base64").toString("utf8");
  }
}
