import type { ChannelInfo, VideoResults } from "../../models/youtube";

export type CachePartition = "video" | "channel" | "playlist" | "videoDetail";

/**
 * A `null` stored in the playlist partition marks a channel whose uploads
 * playlist could not be resolved.
 */
export type PlaylistCacheEntry = VideoResults | null;

/**
 * Response cache with one namespace per kind of lookup. Every getter resolves
 * `undefined` on a miss; setters replace whatever the key held.
 */
export interface VideoCache {
  getVideo(key: string): Promise<VideoResults | undefined>;
  setVideo(key: string, results: VideoResults): Promise<void>;

  getChannel(key: string): Promise<ChannelInfo | undefined>;
  setChannel(key: string, channel: ChannelInfo): Promise<void>;

  getPlaylist(key: string): Promise<PlaylistCacheEntry | undefined>;
  setPlaylist(key: string, playlist: PlaylistCacheEntry): Promise<void>;

  getVideoDetail(key: string): Promise<VideoResults | undefined>;
  setVideoDetail(key: string, details: VideoResults): Promise<void>;

  getServiceName(): string;
}
