// utils/cloudinary.ts

import { v2 as cloudinary } from "cloudinary";
import axios from "axios";
import { z } from "zod";
import { BlobStaging } from "./blobStaging";
import { PublisherConfig } from "../config/publisher.config";
import { HttpClient, requestData } from "../services/platforms/platformError";

const destroyResult = z.object({ result: z.string() });

/**
 * Public id of an asset from its delivery URL, e.g.
 * `.../video/upload/v1716/ready_to_publish/abc.mp4` -> `ready_to_publish/abc`.
 */
export function publicIdFromUrl(url: string): string | null {
  try {
    const { pathname } = new URL(url);
    const match = /\/upload\/(?:v\d+\/)?(.+?)(?:\.[a-zA-Z0-9]+)?$/.exec(pathname);
    return match ? decodeURIComponent(match[1]) : null;
  } catch {
    return null;
  }
}

/** Media staging on Cloudinary, stored as video assets in one folder. */
export class CloudinaryBlobStaging implements BlobStaging {
  constructor(
    private readonly settings: PublisherConfig["cloudinary"],
    private readonly http: Pick<HttpClient, "get"> = axios
  ) {
    cloudinary.config({
      cloud_name: settings.cloudName,
      api_key: settings.apiKey,
      api_secret: settings.apiSecret,
    });
  }

  put(bytes: Buffer): Promise<string> {
    return new Promise((resolve, reject) => {
      const uploadStream = cloudinary.uploader.upload_stream(
        {
          resource_type: "video",
          folder: this.settings.folder,
        },
        (error, result) => {
          if (error) {
            return reject(new Error(`Cloudinary upload failed: ${error.message}`));
          }
          if (!result?.secure_url) {
            return reject(new Error("No secure_url returned from Cloudinary"));
          }
          resolve(result.secure_url);
        }
      );

      uploadStream.end(bytes);
    });
  }

  async get(ref: string): Promise<Buffer> {
    const data = await requestData("fetchMedia", () =>
      this.http.get(ref, { responseType: "arraybuffer" })
    );
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    throw new Error(`Unexpected payload type for ${ref}`);
  }

  async delete(ref: string): Promise<void> {
    const publicId = publicIdFromUrl(ref);
    if (!publicId) {
      console.warn(`[BlobStaging] cannot derive a public id from ${ref}, nothing to delete`);
      return;
    }

    const response = destroyResult.parse(
      await cloudinary.uploader.destroy(publicId, {
        resource_type: "video",
        invalidate: true,
      })
    );
    // "not found" means an earlier delete already went through
    if (response.result !== "ok" && response.result !== "not found") {
      throw new Error(`Cloudinary destroy of ${publicId} returned "${response.result}"`);
    }
  }
}
