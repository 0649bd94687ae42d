// pattern: Functional Core
import type { Article } from "../pipeline/types";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Formats a timestamp as `dd/MM/yyyy HH:mm` in the given IANA timezone.
 */
export function formatPublishedAt(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone: timezone,
    day: "2-digit",
    month: "2-digit",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  return `${part("day")}/${part("month")}/${part("year")} ${part("hour")}:${part("minute")}`;
}

export function formatArticleMessage(
  article: Article,
  timezone: string,
  marker: string,
): string {
  return [
    `${marker} <b>${escapeHtml(article.title)}</b>`,
    "",
    `🚨 <b>Matched:</b> <code>${escapeHtml(article.matchedKeywords.join(", "))}</code>`,
    `📅 <b>Published:</b> ${formatPublishedAt(article.publishedAt, timezone)}`,
    `🌐 <b>Source:</b> ${escapeHtml(article.source)}`,
  ].join("\n");
}
