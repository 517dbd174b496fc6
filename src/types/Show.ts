export type FeedSourceConfig =
  | { kind: 'nyaa_rss'; uploader?: string }
  | { kind: 'subsplease_rss' }
  | { kind: 'nyaa_html'; uploader?: string };

export type FeedSourceKind = FeedSourceConfig['kind'];

export interface TrackedShow {
  id: number;
  title: string;
  aliases: string[];
  season: number;
  sources: FeedSourceConfig[];
  quality: string;
  preferredGroup: string | null;
  downloadPath: string | null;
  lastDownloadedEpisode: number;
  lastDownloadedHash: string | null;
  isTracked: boolean;
  createdAt?: string;
  updatedAt?: string;
}

export type NewTrackedShow = Omit<
  TrackedShow,
  'id' | 'lastDownloadedEpisode' | 'lastDownloadedHash' | 'createdAt' | 'updatedAt'
> & { lastDownloadedEpisode?: number };
