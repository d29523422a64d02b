export interface ChannelRef {
  readonly id: string;
  readonly title: string;
}

export interface VideoItem {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly publishedAt: string; // ISO 8601
  readonly channel: ChannelRef;
  readonly url: string;
}

export type YouTubeAuth =
  | { kind: 'oauth'; clientId: string; clientSecret: string; refreshToken: string }
  | { kind: 'apiKey'; apiKey: string; channelId: string };
