import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("undici", async (importOriginal) => ({
  ...(await importOriginal<typeof import("undici")>()),
  fetch: vi.fn(),
}));

import { fetch, Response } from "undici";
import { ToolError } from "../../errors.js";
import { silentLogger } from "../../utils/logger.js";
import { isChannelId, toChannelMetadata, YouTubeClient } from "../client.js";

const mockedFetch = vi.mocked(fetch);

const CHANNEL = "UCabcdefghijklmnopqrstuv";

function client() {
  return new YouTubeClient({ apiKey: "test-secret", logger: silentLogger, baseUrl: "https://yt.test/v3" });
}

function reply(body: unknown, status = 200) {
  mockedFetch.mockResolvedValueOnce(new Response(JSON.stringify(body), { status }));
}

function requested(call: number): URL {
  return new URL(String(mockedFetch.mock.calls[call][0]));
}

function videoItem(id: string) {
  return {
    id,
    snippet: {
      title: `Video ${id}`,
      description: `About ${id}`,
      channelId: CHANNEL,
      channelTitle: "Test Channel",
      publishedAt: "2024-05-01T10:00:00Z",
      defaultAudioLanguage: "en-US",
    },
    statistics: { viewCount: "1200", likeCount: "34" },
    contentDetails: { duration: "PT4M5S", caption: "true" },
  };
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("isChannelId", () => {
  it("recognizes the UC-prefixed 24 character shape", () => {
    expect(isChannelId(CHANNEL)).toBe(true);
    expect(isChannelId("UCshort")).toBe(false);
    expect(isChannelId("@mkbhd")).toBe(false);
  });
});

describe("YouTubeClient", () => {
  it("requires an API key", () => {
    expect(() => new YouTubeClient({ apiKey: "", logger: silentLogger })).toThrow("YouTube API key is required");
  });

  it("resolves legacy usernames through forUsername", async () => {
    reply({ items: [{ id: CHANNEL }] });

    expect(await client().resolveChannelId("@oldname")).toBe(CHANNEL);
    expect(requested(0).toString()).toBe(
      "https://yt.test/v3/channels?key=test-secret&part=id&forUsername=oldname&maxResults=1"
    );
  });

  it("falls back to a channel search for handles", async () => {
    reply({ items: [] });
    reply({ items: [{ id: { kind: "youtube#channel", channelId: CHANNEL }, snippet: { channelId: CHANNEL } }] });

    expect(await client().resolveChannelId("@newhandle")).toBe(CHANNEL);
    const search = requested(1);
    expect(search.pathname).toBe("/v3/search");
    expect(search.searchParams.get("q")).toBe("newhandle");
    expect(search.searchParams.get("type")).toBe("channel");
  });

  it("returns undefined when nothing matches", async () => {
    reply({ items: [] });
    reply({});
    expect(await client().resolveChannelId("@nobody")).toBeUndefined();
  });

  it("fetches channel metadata by id without resolving", async () => {
    reply({
      items: [
        {
          id: CHANNEL,
          snippet: {
            title: "Test Channel",
            description: "Videos about tests",
            customUrl: "@testchannel",
            publishedAt: "2015-03-01T00:00:00Z",
            country: "NZ",
            thumbnails: { default: { url: "https://img.test/d.jpg" }, high: { url: "https://img.test/h.jpg" } },
          },
          statistics: { subscriberCount: "1500", videoCount: "42", viewCount: "987654" },
          brandingSettings: { channel: { keywords: "testing, tdd,, ci " } },
        },
      ],
    });

    const metadata = await client().getChannelMetadata(CHANNEL);

    expect(mockedFetch).toHaveBeenCalledTimes(1);
    expect(requested(0).searchParams.get("part")).toBe("snippet,statistics,contentDetails,brandingSettings");
    expect(metadata).toEqual({
      channelId: CHANNEL,
      username: undefined,
      title: "Test Channel",
      description: "Videos about tests",
      customUrl: "@testchannel",
      avatarUrl: "https://img.test/h.jpg",
      bannerUrl: undefined,
      subscriberCount: 1500,
      videoCount: 42,
      viewCount: 987654,
      publishedAt: "2015-03-01T00:00:00Z",
      country: "NZ",
      keywords: ["testing", "tdd", "ci"],
    });
  });

  it("pages through the uploads playlist for the latest videos", async () => {
    reply({ items: [{ id: CHANNEL, contentDetails: { relatedPlaylists: { uploads: "UUuploads" } } }] });
    reply({ nextPageToken: "p2", items: [{ contentDetails: { videoId: "v1" } }, { contentDetails: { videoId: "v2" } }] });
    reply({ items: [videoItem("v1"), videoItem("v2")] });
    reply({ items: [{ contentDetails: { videoId: "v3" } }] });
    reply({ items: [videoItem("v3")] });

    const videos = await client().getLatestVideos(CHANNEL, 3);

    expect(videos.map((v) => v.videoId)).toEqual(["v1", "v2", "v3"]);
    expect(requested(1).searchParams.get("maxResults")).toBe("3");
    expect(requested(3).searchParams.get("pageToken")).toBe("p2");
    expect(requested(3).searchParams.get("maxResults")).toBe("1");
    expect(requested(4).searchParams.get("id")).toBe("v3");
    expect(videos[0]).toEqual({
      videoId: "v1",
      title: "Video v1",
      description: "About v1",
      thumbnailUrl: undefined,
      channelId: CHANNEL,
      channelTitle: "Test Channel",
      viewCount: 1200,
      likeCount: 34,
      commentCount: 0,
      publishedAt: "2024-05-01T10:00:00Z",
      durationSeconds: 245,
      tags: [],
      categoryId: undefined,
      hasSubtitles: true,
      defaultAudioLanguage: "en-US",
      defaultLanguage: undefined,
    });
  });

  it("returns no videos for a channel without an uploads playlist", async () => {
    reply({ items: [] });
    expect(await client().getLatestVideos(CHANNEL, 5)).toEqual([]);
  });

  it("searches by publish date for a time range", async () => {
    reply({ items: [{ id: { videoId: "v9" } }, { id: { channelId: CHANNEL } }] });
    reply({ items: [videoItem("v9")] });

    const videos = await client().getVideosByTimeRange(
      CHANNEL,
      new Date("2024-01-01T00:00:00Z"),
      new Date("2024-02-01T00:00:00Z"),
      20
    );

    expect(videos.map((v) => v.videoId)).toEqual(["v9"]);
    const search = requested(0).searchParams;
    expect(search.get("channelId")).toBe(CHANNEL);
    expect(search.get("order")).toBe("date");
    expect(search.get("publishedAfter")).toBe("2024-01-01T00:00:00.000Z");
    expect(search.get("publishedBefore")).toBe("2024-02-01T00:00:00.000Z");
    expect(search.get("maxResults")).toBe("20");
    expect(requested(1).searchParams.get("id")).toBe("v9");
  });

  it("reports API errors as upstream failures", async () => {
    reply({ error: { message: "quotaExceeded" } }, 403);

    const err = await client().getLatestVideos(CHANNEL, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ToolError);
    expect(err instanceof ToolError && err.kind).toBe("upstream");
    expect(err instanceof Error && err.message).toBe("YouTube API error (403) on channels");
  });

  it("reports unexpected payloads as upstream failures", async () => {
    reply({ items: [{ id: CHANNEL, contentDetails: { relatedPlaylists: { uploads: "UUuploads" } } }] });
    reply({ items: [{ contentDetails: { videoId: "v1" } }] });
    reply({ items: [{ id: "v1" }] });

    await expect(client().getLatestVideos(CHANNEL, 1)).rejects.toThrow("Unexpected YouTube API response on videos");
  });
});

describe("toChannelMetadata", () => {
  it("keeps the username it was resolved from and zeroes missing counts", () => {
    const metadata = toChannelMetadata({ id: CHANNEL }, "@someone");
    expect(metadata.username).toBe("@someone");
    expect(metadata.subscriberCount).toBe(0);
    expect(metadata.keywords).toEqual([]);
    expect(metadata.title).toBe("");
  });
});
