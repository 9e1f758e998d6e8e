import { describe, expect, it } from "vitest";
import { MemoryVideoCache } from "../../../src/services/cache/memoryVideoCache";
import { channelItem, video } from "../../mocks/youtube-api";

describe("MemoryVideoCache", () => {
  it("misses on an empty cache", async () => {
    const cache = new MemoryVideoCache();

    await expect(cache.getVideo("alai")).resolves.toBeUndefined();
    await expect(cache.getChannel("UC1")).resolves.toBeUndefined();
    await expect(cache.getPlaylist("UU1-50")).resolves.toBeUndefined();
    await expect(cache.getVideoDetail("a,b")).resolves.toBeUndefined();
  });

  it("keeps the four partitions apart", async () => {
    const cache = new MemoryVideoCache();
    const search = { items: [video("s1", "5000")] };
    const details = { items: [video("d1", "7")] };

    await cache.setVideo("shared", search);
    await cache.setVideoDetail("shared", details);

    await expect(cache.getVideo("shared")).resolves.toBe(search);
    await expect(cache.getVideoDetail("shared")).resolves.toBe(details);
    await expect(cache.getPlaylist("shared")).resolves.toBeUndefined();
    await expect(cache.getChannel("shared")).resolves.toBeUndefined();
  });

  it("replaces an entry wholesale on set", async () => {
    const cache = new MemoryVideoCache();
    const first = { items: [channelItem("UC1", "UU1")] };
    const second = { items: [channelItem("UC1")] };

    await cache.setChannel("UC1", first);
    await cache.setChannel("UC1", second);

    await expect(cache.getChannel("UC1")).resolves.toBe(second);
  });

  it("distinguishes the no-result marker from a miss", async () => {
    const cache = new MemoryVideoCache();

    await cache.setPlaylist("UC9-10", null);

    await expect(cache.getPlaylist("UC9-10")).resolves.toBeNull();
    await expect(cache.getPlaylist("UC9-20")).resolves.toBeUndefined();
  });

  it("does not normalise keys", async () => {
    const cache = new MemoryVideoCache();
    await cache.setVideo("Alai", { items: [] });

    await expect(cache.getVideo("alai")).resolves.toBeUndefined();
    await expect(cache.getVideo(" Alai")).resolves.toBeUndefined();
  });

  it("survives interleaved concurrent reads and writes", async () => {
    const cache = new MemoryVideoCache();
    const writes = Array.from({ length: 20 }, (_, index) =>
      cache.setVideoDetail(`k${index % 4}`, { items: [video(`v${index}`, "1")] }),
    );
    const reads = Array.from({ length: 20 }, (_, index) => cache.getVideoDetail(`k${index % 4}`));

    await Promise.all([...writes, ...reads]);

    const last = await cache.getVideoDetail("k3");
    expect(last?.items.map((item) => item.id)).toEqual(["v19"]);
  });

  it("identifies itself", () => {
    expect(new MemoryVideoCache().getServiceName()).toBe("memory-cache");
  });
});
