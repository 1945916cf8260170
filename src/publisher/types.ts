import { z } from "zod";

export const POST_COLLECTION = "app.bsky.feed.post";
export const EXTERNAL_EMBED_TYPE = "app.bsky.embed.external";

/** Thumbnails larger than this are left off the embed. */
export const MAX_THUMBNAIL_BYTES = 1_000_000;

export const sessionSchema = z.object({
  accessJwt: z.string().min(1),
  refreshJwt: z.string().min(1),
  handle: z.string(),
  did: z.string().min(1),
});

export type Session = z.infer<typeof sessionSchema>;

export const blobSchema = z.object({
  $type: z.literal("blob"),
  ref: z.object({ $link: z.string().min(1) }),
  mimeType: z.string(),
  size: z.number().int().nonnegative(),
});

export type UploadedAsset = z.infer<typeof blobSchema>;

export const uploadBlobResponseSchema = z.object({
  blob: blobSchema,
});

export const createRecordResponseSchema = z.object({
  uri: z.string(),
  cid: z.string(),
});

export type PublishResult = z.infer<typeof createRecordResponseSchema>;

export type ExternalEmbed = {
  readonly $type: typeof EXTERNAL_EMBED_TYPE;
  readonly external: {
    readonly uri: string;
    readonly title: string;
    readonly description: string;
    readonly thumb?: UploadedAsset;
  };
};

export type PostRecord = {
  readonly $type: typeof POST_COLLECTION;
  readonly text: string;
  readonly createdAt: string;
  readonly embed?: ExternalEmbed;
};

export type CreateRecordRequest = {
  readonly repo: string;
  readonly collection: typeof POST_COLLECTION;
  readonly record: PostRecord;
};

export type ClientState = "unauthenticated" | "active" | "failed";
