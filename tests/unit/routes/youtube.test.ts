import http from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "../../../src/app";
import { MemoryVideoCache } from "../../../src/services/cache/memoryVideoCache";
import { YouTubeService } from "../../../src/services/youtubeService";
import {
  channelItem,
  createFakeUpstream,
  pagedHandler,
  playlistItem,
  searchItem,
  video,
  videoLookupHandler,
  type Endpoint,
  type EndpointHandler,
  type FakeUpstream,
} from "../../mocks/youtube-api";

interface TestServer {
  baseUrl: string;
  upstream: FakeUpstream;
  close(): Promise<void>;
}

const servers: TestServer[] = [];

async function startServer(
  handlers: Partial<Record<Endpoint, EndpointHandler>>,
): Promise<TestServer> {
  const upstream = createFakeUpstream(handlers);
  const youtubeService = new YouTubeService("test-key", new MemoryVideoCache(), {
    fetch: upstream.fetch,
  });
  const server = http.createServer(createApp({ youtubeService, environment: "test" }));

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("test server is not listening on a TCP port");
  }

  const testServer: TestServer = {
    baseUrl: `http://127.0.0.1:${address.port}`,
    upstream,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
  servers.push(testServer);
  return testServer;
}

async function getJson(url: string): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url);
  return { status: response.status, body: await response.json() };
}

afterEach(async () => {
  await Promise.all(servers.splice(0).map((server) => server.close()));
});

describe("GET /api/health", () => {
  it("reports the cache in use", async () => {
    const { baseUrl } = await startServer({});

    const { status, body } = await getJson(`${baseUrl}/api/health`);

    expect(status).toBe(200);
    expect(body).toMatchObject({
      api: "yt-cache-client",
      status: "healthy",
      environment: "test",
      cache: "memory-cache",
    });
  });
});

describe("GET /api/youtube/search", () => {
  it("returns the filtered search results", async () => {
    const { baseUrl, upstream } = await startServer({
      search: pagedHandler({
        "": { items: [searchItem("v1"), searchItem("v2")], nextPageToken: "P2" },
        P2: { items: [searchItem("v3")] },
      }),
      videos: videoLookupHandler([video("v1", "4000"), video("v2", "10"), video("v3", "1001")]),
    });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/search?q=alai&pages=2`);

    expect(status).toBe(200);
    expect(body).toMatchObject({ data: { items: [{ id: "v1" }, { id: "v3" }] } });
    expect(upstream.callsTo("search")).toHaveLength(2);
  });

  it("requires a query", async () => {
    const { baseUrl } = await startServer({});

    const { status, body } = await getJson(`${baseUrl}/api/youtube/search?q=%20`);

    expect(status).toBe(400);
    expect(body).toEqual({
      error: { code: "QUERY_REQUIRED", message: "q must be a non-empty string" },
    });
  });

  it("rejects a non-numeric page count", async () => {
    const { baseUrl } = await startServer({});

    const { status, body } = await getJson(`${baseUrl}/api/youtube/search?q=alai&pages=two`);

    expect(status).toBe(400);
    expect(body).toEqual({
      error: {
        code: "INVALID_PAGE_COUNT",
        message: "pages must be a positive integer",
        details: { pages: "two" },
      },
    });
  });

  it("renders integrity failures as 502", async () => {
    const { baseUrl } = await startServer({
      search: () => ({ items: [searchItem("v1")] }),
      videos: videoLookupHandler([video("v1", "")]),
    });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/search?q=broken`);

    expect(status).toBe(502);
    expect(body).toEqual({
      error: {
        code: "INVALID_STATISTIC",
        message: "Video statistics contain an invalid view count",
        details: { videoId: "v1", viewCount: "" },
      },
    });
  });
});

describe("GET /api/youtube/channels/:channelId", () => {
  it("returns the channel record", async () => {
    const { baseUrl } = await startServer({
      channels: () => ({ items: [channelItem("UC1", "UU1")] }),
    });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/channels/UC1`);

    expect(status).toBe(200);
    expect(body).toEqual({ data: { items: [channelItem("UC1", "UU1")] } });
  });

  it("answers 404 for an unknown channel", async () => {
    const { baseUrl } = await startServer({ channels: () => ({ items: [] }) });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/channels/UC-none`);

    expect(status).toBe(404);
    expect(body).toEqual({
      error: {
        code: "CHANNEL_NOT_FOUND",
        message: "Channel not found",
        details: { channelId: "UC-none" },
      },
    });
  });
});

describe("GET /api/youtube/channels/:channelId/videos", () => {
  it("lists the channel uploads", async () => {
    const { baseUrl, upstream } = await startServer({
      channels: () => ({ items: [channelItem("UC1", "UU1")] }),
      playlistItems: () => ({ items: [playlistItem("u1"), playlistItem("u2")] }),
      videos: videoLookupHandler([video("u1", "3"), video("u2", "4")]),
    });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/channels/UC1/videos?count=2`);

    expect(status).toBe(200);
    expect(body).toMatchObject({ data: { items: [{ id: "u1" }, { id: "u2" }] } });
    expect(upstream.callsTo("playlistItems")[0]?.searchParams.get("playlistId")).toBe("UU1");
  });

  it("answers 404 when the channel has no uploads playlist", async () => {
    const { baseUrl } = await startServer({ channels: () => ({ items: [channelItem("UC2")] }) });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/channels/UC2/videos`);

    expect(status).toBe(404);
    expect(body).toMatchObject({ error: { code: "UPLOADS_PLAYLIST_NOT_FOUND" } });
  });

  it("rejects a count above the limit", async () => {
    const { baseUrl, upstream } = await startServer({});

    const { status, body } = await getJson(`${baseUrl}/api/youtube/channels/UC1/videos?count=501`);

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: { code: "INVALID_VIDEO_COUNT" } });
    expect(upstream.calls).toHaveLength(0);
  });
});

describe("GET /api/youtube/videos", () => {
  it("looks up the listed ids", async () => {
    const { baseUrl, upstream } = await startServer({
      videos: videoLookupHandler([video("a", "1"), video("b", "2")]),
    });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/videos?ids=a,%20b,,`);

    expect(status).toBe(200);
    expect(body).toMatchObject({ data: { items: [{ id: "a" }, { id: "b" }] } });
    expect(upstream.callsTo("videos")[0]?.searchParams.get("id")).toBe("a,b");
  });

  it("requires at least one id", async () => {
    const { baseUrl } = await startServer({});

    const { status, body } = await getJson(`${baseUrl}/api/youtube/videos?ids=,`);

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: { code: "VIDEO_IDS_REQUIRED" } });
  });

  it("relays upstream HTTP failures", async () => {
    const { baseUrl } = await startServer({
      videos: () => new Response("forbidden", { status: 403, statusText: "Forbidden" }),
    });

    const { status, body } = await getJson(`${baseUrl}/api/youtube/videos?ids=a`);

    expect(status).toBe(403);
    expect(body).toMatchObject({ error: { code: "YOUTUBE_API_ERROR" } });
  });
});

describe("unknown routes", () => {
  it("answers 404 with the error envelope", async () => {
    const { baseUrl } = await startServer({});

    const { status, body } = await getJson(`${baseUrl}/api/nope`);

    expect(status).toBe(404);
    expect(body).toEqual({ error: { code: "NOT_FOUND", message: "No route for GET /api/nope" } });
  });
});
