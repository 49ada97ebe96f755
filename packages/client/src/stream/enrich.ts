/**
 * Upload enrichment
 *
 * Upload events on the stream name the file but not where it is stored.
 * The details are fetched and attached as `upload` before classification.
 */

import { getErrorMessage, isCancellation } from '@fireside/core';
import { uploadLookupTarget } from '../messages/classifier.js';
import type { StreamTransport } from '../transport/types.js';
import { getLog } from '../log.js';

const log = getLog('UploadEnrichment');

/**
 * Return `raw` with upload details attached, or `raw` itself when it needs
 * none or the lookup fails. Cancellation propagates.
 */
export async function enrichUploadEvent(
  raw: unknown,
  transport: StreamTransport,
  roomId: number,
  signal: AbortSignal
): Promise<unknown> {
  const target = uploadLookupTarget(raw);
  if (!target || !transport.getUploadDetails || typeof raw !== 'object' || raw === null) {
    return raw;
  }

  try {
    const upload = await transport.getUploadDetails(target.roomId ?? roomId, target.messageId, signal);
    return { ...raw, upload };
  } catch (error) {
    if (isCancellation(error, signal)) throw error;
    log.warn(`Could not load upload details for message ${target.messageId}`, {
      error: getErrorMessage(error),
    });
    return raw;
  }
}
