import { google, youtube_v3 } from 'googleapis';
import { getHttpStatus } from '../errors.js';
import type { ChannelRef, VideoItem, YouTubeAuth } from '../../types/index.js';

const PAGE_SIZE = 50;
const UNAVAILABLE_TITLES = new Set(['Private video', 'Deleted video']);

export interface YouTubeClientOptions {
  timeoutMs?: number;
  proxyUrl?: string;
}

export class YouTubeClient {
  private youtube: youtube_v3.Youtube;
  private auth: YouTubeAuth;
  private requestOptions: { timeout: number; proxy?: string };

  constructor(auth: YouTubeAuth, options: YouTubeClientOptions = {}) {
    this.auth = auth;
    this.requestOptions = { timeout: options.timeoutMs ?? 60_000 };
    if (options.proxyUrl) {
      this.requestOptions.proxy = options.proxyUrl;
    }

    if (auth.kind === 'oauth') {
      // googleapis refreshes the access token from the refresh token on demand
      const oauth2Client = new google.auth.OAuth2(auth.clientId, auth.clientSecret);
      oauth2Client.setCredentials({ refresh_token: auth.refreshToken });
      this.youtube = google.youtube({ version: 'v3', auth: oauth2Client });
    } else {
      this.youtube = google.youtube({ version: 'v3', auth: auth.apiKey });
    }
  }

  videoUrl(videoId: string): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
  }

  uploadsPlaylistId(channelId: string): string | null {
    return channelId.startsWith('UC') ? `UU${channelId.slice(2)}` : null;
  }

  async listSubscriptions(maxChannels: number): Promise<ChannelRef[]> {
    const channels: ChannelRef[] = [];
    let pageToken: string | undefined;

    while (channels.length < maxChannels) {
      const response = await this.youtube.subscriptions.list(
        {
          part: ['snippet'],
          ...(this.auth.kind === 'oauth' ? { mine: true } : { channelId: this.auth.channelId }),
          maxResults: Math.min(PAGE_SIZE, maxChannels - channels.length),
          pageToken,
        },
        this.requestOptions
      );

      for (const item of response.data.items || []) {
        const channelId = item.snippet?.resourceId?.channelId;
        if (!channelId) continue;
        channels.push({ id: channelId, title: item.snippet?.title || channelId });
      }

      pageToken = response.data.nextPageToken || undefined;
      if (!pageToken) break;
    }

    return channels.slice(0, maxChannels);
  }

  private async resolveUploadsPlaylist(channelId: string): Promise<string | null> {
    const derived = this.uploadsPlaylistId(channelId);
    if (derived) return derived;

    const response = await this.youtube.channels.list(
      { part: ['contentDetails'], id: [channelId] },
      this.requestOptions
    );
    return response.data.items?.[0]?.contentDetails?.relatedPlaylists?.uploads || null;
  }

  /**
   * Uploads of `channel` published at or after `publishedAfter`, newest first.
   * The uploads playlist is newest-first, so paging stops at the first older item.
   */
  async listRecentUploads(channel: ChannelRef, publishedAfter: Date, maxVideos: number): Promise<VideoItem[]> {
    if (maxVideos <= 0) return [];

    const playlistId = await this.resolveUploadsPlaylist(channel.id);
    if (!playlistId) return [];

    const videos: VideoItem[] = [];
    let pageToken: string | undefined;
    let reachedOlder = false;

    do {
      const page = await this.fetchPlaylistPage(playlistId, pageToken);
      if (!page) return [];

      for (const item of page.items || []) {
        const video = this.toVideoItem(item, channel);
        if (!video) continue;

        if (new Date(video.publishedAt).getTime() < publishedAfter.getTime()) {
          reachedOlder = true;
          break;
        }

        videos.push(video);
        if (videos.length >= maxVideos) break;
      }

      pageToken = page.nextPageToken || undefined;
    } while (pageToken && !reachedOlder && videos.length < maxVideos);

    return videos;
  }

  private async fetchPlaylistPage(
    playlistId: string,
    pageToken: string | undefined
  ): Promise<youtube_v3.Schema$PlaylistItemListResponse | null> {
    try {
      const response = await this.youtube.playlistItems.list(
        {
          part: ['snippet', 'contentDetails'],
          playlistId,
          maxResults: PAGE_SIZE,
          pageToken,
        },
        this.requestOptions
      );
      return response.data;
    } catch (error) {
      // Channels without uploads have no uploads playlist
      if (getHttpStatus(error) === 404) return null;
      throw error;
    }
  }

  private toVideoItem(item: youtube_v3.Schema$PlaylistItem, channel: ChannelRef): VideoItem | null {
    const videoId = item.contentDetails?.videoId || item.snippet?.resourceId?.videoId;
    const title = item.snippet?.title || '';
    const publishedAt = item.contentDetails?.videoPublishedAt || item.snippet?.publishedAt;

    if (!videoId || !publishedAt || UNAVAILABLE_TITLES.has(title)) {
      return null;
    }

    return Object.freeze({
      id: videoId,
      title,
      description: item.snippet?.description || '',
      publishedAt,
      channel,
      url: this.videoUrl(videoId),
    });
  }
}
