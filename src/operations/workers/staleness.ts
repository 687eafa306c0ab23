import { compareValidators, storedValidators } from "../../registry/freshness.js";
import { recordKey } from "../../registry/types.js";
import type { ArtifactRecord } from "../../registry/types.js";
import type { HttpTransport } from "../../transport/http.js";
import { errorMessage } from "../../utils/errors.js";
import type { Channel } from "../channel.js";
import type { CheckMessage } from "../messages.js";

/**
 * Probe a record's provenance URL with HEAD and classify it without
 * downloading the body.
 */
export async function runStalenessCheck(
  http: HttpTransport,
  record: ArtifactRecord,
  channel: Channel<CheckMessage>
): Promise<void> {
  const key = recordKey(record);

  if (record.source_url === null) {
    channel.send({ type: "no-provenance", key });
    return;
  }

  try {
    const probe = await http.head(record.source_url);
    channel.send({ type: compareValidators(storedValidators(record), probe.validators), key });
  } catch (error) {
    channel.send({ type: "check-error", key, reason: errorMessage(error) });
  }
}
