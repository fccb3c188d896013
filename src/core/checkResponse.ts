import { z } from 'zod';
import { APIError, type ErrorEntry } from '../error/apiError.js';
import { lenientField } from '../utils/schema.js';
import { validator } from '../utils/validator.js';
import { safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { ApiRequest } from './request.js';

/**
 * One eBay error entry. Fields that are `null` or of the wrong type are dropped,
 * so a single odd field never costs the rest of the entry.
 */
export const errorEntrySchema = z.object({
  errorId: lenientField(z.number()),
  domain: lenientField(z.string()),
  subDomain: lenientField(z.string()),
  category: lenientField(z.string()),
  message: lenientField(z.string()),
  longMessage: lenientField(z.string()),
  inputRefIds: lenientField(z.array(z.string())),
  outputRefIds: lenientField(z.array(z.string())),
  parameters: lenientField(
    z.array(z.object({ name: lenientField(z.string()), value: lenientField(z.string()) })),
  ),
});

// Entries are decoded one by one so that a malformed entry only drops itself.
const errorPayloadSchema = z.object({
  errors: lenientField(z.array(z.unknown())),
});

/**
 * Checks an API response for errors.
 *
 * A 2xx status yields `null`. Anything else yields an {@link APIError} carrying the status,
 * the request dump and whatever error entries the body holds. A body that can't be read or
 * isn't an eBay error payload leaves the entry list empty; this function never fails itself.
 * The body is consumed either way.
 */
export async function checkResponse(
  request: ApiRequest,
  response: Response,
  requestDump: string,
): Promise<APIError | null> {
  if (response.status >= 200 && response.status < 300) {
    return null;
  }

  return new APIError({
    method: request.method,
    url: request.url.href,
    status: response.status,
    statusText: response.statusText,
    errors: await readErrorEntries(response),
    requestDump,
  });
}

async function readErrorEntries(response: Response): Promise<ErrorEntry[]> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText || !text) {
    return [];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [];
  }

  const [errPayload, payload] = await validator(json, errorPayloadSchema);
  if (errPayload) {
    return [];
  }

  const entries: ErrorEntry[] = [];
  for (const raw of payload.errors ?? []) {
    const [errEntry, entry] = await validator(raw, errorEntrySchema);
    if (!errEntry) {
      entries.push(entry);
    }
  }

  return entries;
}
