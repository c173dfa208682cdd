import type { Logger } from "pino";
import type { UpstreamErrorPattern } from "../config.js";
import { toRelayError } from "../errors.js";
import type { ImageSource } from "../prompt/messages.js";
import { checkUpstreamResponse } from "../relay/classify.js";
import type { UpstreamClient } from "../relay/upstream.js";

export interface ImageUploadContext {
  orgUuid: string;
  cookie: string;
  rid: string;
  signal?: AbortSignal;
}

export interface ImageUploader {
  /** Uploads each image and returns the upstream file ids of the ones that made it. */
  upload(images: ImageSource[], context: ImageUploadContext): Promise<string[]>;
}

const EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/gif": "gif",
  "image/webp": "webp",
};

export class UpstreamImageUploader implements ImageUploader {
  public constructor(
    private readonly client: UpstreamClient,
    private readonly patterns: UpstreamErrorPattern[],
    private readonly logger: Logger,
  ) {}

  public async upload(images: ImageSource[], context: ImageUploadContext): Promise<string[]> {
    const fileIds: string[] = [];

    for (const [index, image] of images.entries()) {
      try {
        fileIds.push(await this.uploadOne(image, index, context));
      } catch (error) {
        const relayError = toRelayError(error, "Image upload failed");
        this.logger.warn(
          {
            rid: context.rid,
            event: "image_upload_failed",
            index,
            errorCode: relayError.code,
            message: relayError.message,
          },
          "image_upload_failed",
        );
      }
    }

    return fileIds;
  }

  private async uploadOne(image: ImageSource, index: number, context: ImageUploadContext): Promise<string> {
    const bytes = Buffer.from(image.data, "base64");
    const extension = EXTENSIONS[image.media_type] ?? "bin";
    const form = new FormData();
    form.append("file", new Blob([bytes], { type: image.media_type }), `image-${index}.${extension}`);

    const response = await this.client.send({
      method: "POST",
      path: `/api/${context.orgUuid}/upload`,
      cookie: context.cookie,
      form,
      signal: context.signal,
    });
    await checkUpstreamResponse(response, this.patterns);

    const payload: unknown = await response.json();
    const fileUuid = payload && typeof payload === "object" ? Reflect.get(payload, "file_uuid") : undefined;
    if (typeof fileUuid !== "string" || fileUuid.length === 0) {
      throw new Error("Upload response carries no file_uuid");
    }
    return fileUuid;
  }
}
