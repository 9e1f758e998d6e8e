import { afterEach, describe, expect, it } from "vitest";
import { closeServices, getYouTubeService } from "../../src/services";
import { YouTubeService } from "../../src/services/youtubeService";

describe("getYouTubeService", () => {
  afterEach(async () => {
    await closeServices();
  });

  it("builds one shared service from configuration", () => {
    const first = getYouTubeService();
    const second = getYouTubeService();

    expect(first).toBeInstanceOf(YouTubeService);
    expect(second).toBe(first);
    expect(first.getCacheName()).toBe("memory-cache");
    expect(first.getApiKey()).toBe("test-key");
  });

  it("builds a fresh service after closeServices", async () => {
    const before = getYouTubeService();

    await closeServices();
    const after = getYouTubeService();

    expect(after).not.toBe(before);
    expect(after.getCacheName()).toBe("memory-cache");
  });
});
