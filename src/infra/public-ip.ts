import { z } from "zod";
import { logger } from "../logger";

export const DEFAULT_PUBLIC_ADDRESS_URL = "https://api.ipify.org?format=json";
export const DEFAULT_PUBLIC_ADDRESS_TIMEOUT_MS = 5000;

const LookupResponseSchema = z.object({
  ip: z.string().trim().min(1),
});

export interface PublicAddressOptions {
  lookupUrl?: string;
  timeoutMs?: number;
}

/**
 * Asks an echo service for this host's public IP. Resolves to undefined when
 * the lookup fails for any reason; callers show a placeholder instead.
 */
export async function resolvePublicAddress(
  options: PublicAddressOptions = {},
): Promise<string | undefined> {
  const url = options.lookupUrl ?? DEFAULT_PUBLIC_ADDRESS_URL;
  const controller = new AbortController();
  const timeoutId = setTimeout(
    () => controller.abort(),
    options.timeoutMs ?? DEFAULT_PUBLIC_ADDRESS_TIMEOUT_MS,
  );

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: controller.signal,
    });
    if (!response.ok) {
      logger.error({ url, status: response.status }, "Public address lookup failed");
      return undefined;
    }

    const parsed = LookupResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.error({ url }, "Public address lookup returned no ip field");
      return undefined;
    }
    logger.info({ address: parsed.data.ip }, "Resolved public address");
    return parsed.data.ip;
  } catch (err) {
    logger.error({ err, url }, "Public address lookup failed");
    return undefined;
  } finally {
    clearTimeout(timeoutId);
  }
}
