export type FeedEntry = {
  readonly id: string;
  readonly url: string;
  readonly title: string | null;
  readonly publishedAt: Date | null;
};

export type PageMetadata = {
  readonly title: string | null;
  readonly description: string | null;
  readonly imageUrl: string | null;
};

export type ImageAsset = {
  readonly bytes: Buffer;
  readonly contentType: string;
};

export type HttpOptions = {
  readonly timeoutMs: number;
  readonly userAgent: string;
};
