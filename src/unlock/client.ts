import { z } from "zod";
import type { Logger } from "pino";
import type { UnlockConfig } from "../config";

export type UnlockResult =
  | { readonly success: true; readonly url: string }
  | { readonly success: false; readonly error: string };

const unlockResponseSchema = z.object({
  status: z.string(),
  url: z.string().url().optional(),
});

/**
 * Asks the unlocking API for a paywall-free variant of `link`. Never throws.
 */
export async function requestUnlockedLink(
  link: string,
  config: UnlockConfig,
  logger: Logger,
): Promise<UnlockResult> {
  try {
    const response = await fetch(config.apiUrl, {
      method: "POST",
      signal: AbortSignal.timeout(config.timeoutMs),
      headers: {
        "Content-Type": "application/json",
        Referer: config.serviceUrl,
      },
      body: JSON.stringify({ url: link }),
    });

    if (!response.ok) {
      return { success: false, error: `HTTP ${response.status}: ${response.statusText}` };
    }

    const parsed = unlockResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.status !== "success" || !parsed.data.url) {
      return { success: false, error: "unlock service returned no link" };
    }

    return { success: true, url: parsed.data.url };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ link, error: message }, "unlock request failed");
    return { success: false, error: message };
  }
}
