export const ErrorCode = {
  Internal: "INTERNAL_ERROR",
  UpstreamUnreachable: "YOUTUBE_API_UNREACHABLE",
  UpstreamStatus: "YOUTUBE_API_ERROR",
  UpstreamInvalidResponse: "YOUTUBE_API_INVALID_RESPONSE",
  ChannelNotFound: "CHANNEL_NOT_FOUND",
  UploadsPlaylistNotFound: "UPLOADS_PLAYLIST_NOT_FOUND",
  InvalidStatistic: "INVALID_STATISTIC",
  QueryRequired: "QUERY_REQUIRED",
  InvalidPageCount: "INVALID_PAGE_COUNT",
  InvalidVideoCount: "INVALID_VIDEO_COUNT",
  VideoIdsRequired: "VIDEO_IDS_REQUIRED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppErrorOptions {
  statusCode?: number;
  code?: ErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  statusCode: number;
  code: ErrorCode;
  details?: unknown;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? ErrorCode.Internal;
    this.details = options.details;
    Error.captureStackTrace?.(this, AppError);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
