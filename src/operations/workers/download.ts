/**
 * Artifact download worker.
 *
 * Streams the body into "<final>.<operation>.part", hashing exactly the bytes
 * written, and renames the file into place only once the whole body is on
 * disk. Each run writes its own partial file, so overlapping downloads of one
 * artifact never share bytes; the last rename wins.
 * Any failure removes the partial file; a digest is never reported for it.
 */

import { createHash } from "crypto";
import { mkdir, open, rename, rm } from "fs/promises";
import { join } from "path";
import { Readable, pipeline } from "stream";
import { createGunzip } from "zlib";
import { v4 as uuidv4 } from "uuid";
import type { HttpTransport } from "../../transport/http.js";
import { IntegrityError, errorCode, errorMessage } from "../../utils/errors.js";
import { dispatchLogger } from "../../utils/logger.js";
import type { Channel } from "../channel.js";
import type { DownloadMessage } from "../messages.js";

export interface DownloadRequest {
  url: string;
  destDir: string;
  filename: string;
  decompress: boolean;        // Inflate .gz bodies; reject .xz ones
}

type Encoding = "gzip" | "none";

interface DownloadTarget {
  filename: string;
  encoding: Encoding;
}

/**
 * Strip path separators and parent references from a requested file name
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(/[/\\]/g, "_").replace(/\.\./g, "_");
}

/**
 * Last path segment of a URL, used when no file name was given
 */
export function filenameFromUrl(url: string, fallback = "artifact.patch"): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const last = pathname.split("/").filter(Boolean).pop();
  return last ? decodeURIComponent(last) : fallback;
}

export function resolveTarget(filename: string, decompress: boolean): DownloadTarget {
  const safe = sanitizeFilename(filename);
  if (!decompress) {
    return { filename: safe, encoding: "none" };
  }
  if (safe.endsWith(".gz")) {
    return { filename: safe.slice(0, -".gz".length), encoding: "gzip" };
  }
  if (safe.endsWith(".xz")) {
    throw new IntegrityError(
      "INTEGRITY.UNSUPPORTED_ENCODING",
      `Cannot decompress ${safe}: xz is not supported, download the uncompressed file instead`
    );
  }
  return { filename: safe, encoding: "none" };
}

async function discardPartial(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    dispatchLogger.warn("Could not remove partial download", { path, error: errorMessage(error) });
  }
}

export async function runDownload(
  http: HttpTransport,
  request: DownloadRequest,
  channel: Channel<DownloadMessage>
): Promise<void> {
  let partPath: string | null = null;

  try {
    const target = resolveTarget(request.filename, request.decompress);
    const finalPath = join(request.destDir, target.filename);
    partPath = `${finalPath}.${uuidv4()}.part`;

    await mkdir(request.destDir, { recursive: true });
    const response = await http.get(request.url);

    let received = 0;
    async function* counted(): AsyncGenerator<Uint8Array> {
      for await (const chunk of response.body) {
        received += chunk.byteLength;
        channel.send({ type: "progress", received, total: response.contentLength });
        yield chunk;
      }
    }

    const source: AsyncIterable<Uint8Array> =
      target.encoding === "gzip"
        ? pipeline(Readable.from(counted()), createGunzip(), (error) => {
            if (error) {
              dispatchLogger.debug("Decompression stream ended with error", { error: errorMessage(error) });
            }
          })
        : counted();

    const hash = createHash("sha256");
    let written = 0;
    const file = await open(partPath, "w");
    try {
      for await (const chunk of source) {
        await file.write(chunk);
        hash.update(chunk);
        written += chunk.byteLength;
      }
    } finally {
      await file.close();
    }

    if (response.contentLength !== null && received !== response.contentLength) {
      throw new IntegrityError(
        "INTEGRITY.TRUNCATED",
        `Body truncated: received ${received} of ${response.contentLength} bytes`
      );
    }

    await rename(partPath, finalPath);
    partPath = null;

    channel.send({
      type: "success",
      path: finalPath,
      filename: target.filename,
      bytesWritten: written,
      sha256: hash.digest("hex"),
      validators: response.validators,
    });
  } catch (error) {
    if (partPath) {
      await discardPartial(partPath);
    }
    channel.send({ type: "error", code: errorCode(error), reason: errorMessage(error) });
  }
}
