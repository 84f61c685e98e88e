// ---------------------------------------------------------------------------
// PlaybackInfo synthesis for strm items
// ---------------------------------------------------------------------------
// Mirrors the media server's PlaybackInfoResponse shape. Everything the server
// would learn by probing the stream (container, runtime, bitrate, size and the
// stream list) is left null or empty; the player discovers it on open.

export interface MediaSourceInfo {
  Id: string;
  ItemId: string;
  Protocol: 'Http' | 'File';
  Type: 'Default';
  IsRemote: boolean;
  SupportsDirectPlay: boolean;
  SupportsDirectStream: boolean;
  SupportsTranscoding: boolean;
  SupportsProbing: boolean;
  RequiresOpening: boolean;
  RequiresClosing: boolean;
  RequiresLooping: boolean;
  IsInfiniteStream: boolean;
  ReadAtNativeFramerate: boolean;
  Container: string | null;
  RunTimeTicks: number | null;
  Bitrate: number | null;
  Size: number | null;
  MediaStreams: unknown[];
  Formats: string[];
  RequiredHttpHeaders: Record<string, string>;
  DefaultAudioStreamIndex: number | null;
  DefaultSubtitleStreamIndex: number | null;
  DirectStreamUrl: string;
}

export interface PlaybackInfoResponse {
  MediaSources: MediaSourceInfo[];
  PlaySessionId: string;
  ErrorCode: string | null;
}

export function directStreamUrl(itemId: string, mediaSourceId: string): string {
  const query = new URLSearchParams({ static: 'true', MediaSourceId: mediaSourceId });
  return `/Videos/${encodeURIComponent(itemId)}/stream?${query.toString()}`;
}

export function synthesizePlaybackInfo(itemId: string, mediaSourceId: string = itemId): PlaybackInfoResponse {
  return {
    MediaSources: [
      {
        Id:                         mediaSourceId,
        ItemId:                     itemId,
        Protocol:                   'Http',
        Type:                       'Default',
        IsRemote:                   true,
        SupportsDirectPlay:         true,
        SupportsDirectStream:       true,
        SupportsTranscoding:        false,
        SupportsProbing:            false,
        RequiresOpening:            false,
        RequiresClosing:            false,
        RequiresLooping:            false,
        IsInfiniteStream:           false,
        ReadAtNativeFramerate:      false,
        Container:                  null,
        RunTimeTicks:               null,
        Bitrate:                    null,
        Size:                       null,
        MediaStreams:               [],
        Formats:                    [],
        RequiredHttpHeaders:        {},
        DefaultAudioStreamIndex:    null,
        DefaultSubtitleStreamIndex: null,
        DirectStreamUrl:            directStreamUrl(itemId, mediaSourceId),
      },
    ],
    PlaySessionId: `play_${itemId}`,
    ErrorCode: null,
  };
}
