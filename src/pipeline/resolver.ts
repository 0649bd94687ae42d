import type { Logger } from "pino";

/**
 * Follows redirects with a HEAD request and returns the final URL. Falls back
 * to the original link on any failure.
 */
export async function resolveArticleLink(
  link: string,
  timeoutMs: number,
  logger: Logger,
): Promise<string> {
  try {
    const response = await fetch(link, {
      method: "HEAD",
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
    return response.url || link;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ link, error: message }, "link resolution failed, keeping original");
    return link;
  }
}
