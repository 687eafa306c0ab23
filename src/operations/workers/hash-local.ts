import { createHash } from "crypto";
import { createReadStream } from "fs";
import { basename } from "path";
import { errorMessage } from "../../utils/errors.js";
import type { Channel } from "../channel.js";
import type { HashMessage } from "../messages.js";

/**
 * SHA-256 of a file already on disk, for artifacts placed by hand
 */
export async function hashFile(path: string): Promise<{ sha256: string; bytes: number }> {
  const hash = createHash("sha256");
  let bytes = 0;
  for await (const chunk of createReadStream(path)) {
    const data: Buffer = chunk;
    hash.update(data);
    bytes += data.byteLength;
  }
  return { sha256: hash.digest("hex"), bytes };
}

export async function runHashLocal(path: string, channel: Channel<HashMessage>): Promise<void> {
  try {
    const { sha256, bytes } = await hashFile(path);
    channel.send({ type: "hashed", path, filename: basename(path), sha256, bytes });
  } catch (error) {
    channel.send({ type: "error", reason: errorMessage(error) });
  }
}
