import type { ChannelInfo, VideoResults } from "../../models/youtube";
import type { PlaylistCacheEntry, VideoCache } from "./videoCache";

export const MEMORY_CACHE_NAME = "memory-cache";

/** Process-local cache. Entries live until the process exits. */
export class MemoryVideoCache implements VideoCache {
  private readonly videos = new Map<string, VideoResults>();
  private readonly channels = new Map<string, ChannelInfo>();
  private readonly playlists = new Map<string, PlaylistCacheEntry>();
  private readonly videoDetails = new Map<string, VideoResults>();

  async getVideo(key: string): Promise<VideoResults | undefined> {
    return this.videos.get(key);
  }

  async setVideo(key: string, results: VideoResults): Promise<void> {
    this.videos.set(key, results);
  }

  async getChannel(key: string): Promise<ChannelInfo | undefined> {
    return this.channels.get(key);
  }

  async setChannel(key: string, channel: ChannelInfo): Promise<void> {
    this.channels.set(key, channel);
  }

  async getPlaylist(key: string): Promise<PlaylistCacheEntry | undefined> {
    return this.playlists.get(key);
  }

  async setPlaylist(key: string, playlist: PlaylistCacheEntry): Promise<void> {
    this.playlists.set(key, playlist);
  }

  async getVideoDetail(key: string): Promise<VideoResults | undefined> {
    return this.videoDetails.get(key);
  }

  async setVideoDetail(key: string, details: VideoResults): Promise<void> {
    this.videoDetails.set(key, details);
  }

  getServiceName(): string {
    return MEMORY_CACHE_NAME;
  }
}
