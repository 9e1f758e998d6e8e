export interface Thumbnail {
  url?: string;
  width?: number;
  height?: number;
}

export interface Thumbnails {
  default?: Thumbnail;
  medium?: Thumbnail;
  high?: Thumbnail;
}

export interface VideoSnippet {
  channelId?: string;
  channelTitle?: string;
  publishedAt?: string;
  title?: string;
  description?: string;
  thumbnails?: Thumbnails;
  tags?: string[];
}

/** Counters arrive from the API as decimal strings. */
export interface VideoStatistics {
  viewCount?: string;
  likeCount?: string;
  dislikeCount?: string;
  favoriteCount?: string;
  commentCount?: string;
}

export interface Video {
  id: string;
  snippet?: VideoSnippet;
  statistics?: VideoStatistics;
}

export interface VideoResults {
  items: Video[];
  nextPageToken?: string;
}

export interface ChannelItem {
  id: string;
  snippet?: {
    publishedAt?: string;
    title?: string;
    description?: string;
    customUrl?: string;
    channelTitle?: string;
    thumbnails?: Thumbnails;
    localized?: {
      title?: string;
      description?: string;
    };
    country?: string;
  };
  contentDetails?: {
    relatedPlaylists?: {
      likes?: string;
      uploads?: string;
    };
  };
  statistics?: {
    viewCount?: string;
    subscriberCount?: string;
    hiddenSubscriberCount?: boolean;
    videoCount?: string;
  };
}

export interface ChannelInfo {
  items: ChannelItem[];
  nextPageToken?: string;
}

/** Per-video fields carried over from a search or playlist listing. */
export interface SnippetInfo {
  channelTitle?: string;
  channelId?: string;
  thumbnails?: Thumbnails;
}

export type SnippetIndex = ReadonlyMap<string, SnippetInfo>;

export interface SearchResultItem {
  id?: {
    kind?: string;
    videoId?: string;
  };
  snippet?: {
    publishedAt?: string;
    title?: string;
    description?: string;
    channelTitle?: string;
    channelId?: string;
    thumbnails?: Thumbnails;
  };
}

export interface PlaylistVideoItem {
  id?: string;
  snippet?: {
    publishedAt?: string;
    title?: string;
    description?: string;
    thumbnails?: Thumbnails;
    channelTitle?: string;
  };
  contentDetails?: {
    videoId?: string;
    videoPublishedAt?: string;
  };
}

export interface ListResponse<T> {
  items?: T[];
  nextPageToken?: string;
  pageInfo?: {
    totalResults?: number;
    resultsPerPage?: number;
  };
}
