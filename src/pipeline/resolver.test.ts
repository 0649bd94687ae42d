import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { resolveArticleLink } from "./resolver";

const logger = pino({ level: "silent" });

describe("resolveArticleLink", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the final URL after redirects", async () => {
    const response = new Response(null, { status: 200 });
    Object.defineProperty(response, "url", { value: "https://times.example.com/story" });
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(response));

    const link = await resolveArticleLink("https://news.example.com/r/1", 1000, logger);

    expect(link).toBe("https://times.example.com/story");
  });

  it("should keep the original link when the request fails", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("timeout")));
    const warn = vi.spyOn(logger, "warn");

    const link = await resolveArticleLink("https://news.example.com/r/1", 1000, logger);

    expect(link).toBe("https://news.example.com/r/1");
    expect(warn).toHaveBeenCalledWith(
      { link: "https://news.example.com/r/1", error: "timeout" },
      "link resolution failed, keeping original",
    );
  });

  it("should keep the original link when no final URL is reported", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(null, { status: 200 })));

    const link = await resolveArticleLink("https://news.example.com/r/1", 1000, logger);

    expect(link).toBe("https://news.example.com/r/1");
  });
});
