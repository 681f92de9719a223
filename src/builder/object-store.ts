import { createReadStream, type ReadStream } from "node:fs";
import fs from "node:fs/promises";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { PublishError, errorMessage } from "../errors.js";
import { storeLocation } from "./naming.js";
import type { ObjectStore, PublishedLocation } from "./types.js";

let sharedClient: S3Client | undefined;

/** One client per process, reused across warm invocations. */
export function sharedS3Client(): S3Client {
  sharedClient ??= new S3Client({});
  return sharedClient;
}

/**
 * Amazon S3 backed store. With bucket versioning enabled, a rebuild of the
 * same key keeps the previous object as a noncurrent version.
 */
export function createS3ObjectStore(client: S3Client): ObjectStore {
  return {
    async put(
      bucket: string,
      key: string,
      filePath: string,
    ): Promise<PublishedLocation> {
      let body: ReadStream | undefined;
      try {
        const stats = await fs.stat(filePath);
        body = createReadStream(filePath);
        await client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentLength: stats.size,
            ContentType: "application/zip",
          }),
        );
      } catch (error) {
        throw new PublishError(
          `Upload to ${storeLocation(bucket, key)} failed: ${errorMessage(error)}`,
          { cause: error },
        );
      } finally {
        // An open handle keeps the archive's space after it is unlinked.
        body?.destroy();
      }
      return { bucket, key, location: storeLocation(bucket, key) };
    },
  };
}
