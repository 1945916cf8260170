// pattern: Imperative Shell
import sharp from "sharp";
import type { Logger } from "pino";
import { ThumbnailDownloadError, errorMessage } from "../errors";
import type { HttpOptions, ImageAsset } from "./types";

export const THUMBNAIL_MAX_EDGE_PX = 1000;

const FALLBACK_CONTENT_TYPE = "application/octet-stream";

async function downloadImage(
  imageUrl: string,
  options: HttpOptions,
): Promise<ImageAsset> {
  try {
    const response = await fetch(imageUrl, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: "image/*",
      },
    });

    if (!response.ok) {
      throw new ThumbnailDownloadError(
        `HTTP ${response.status}: ${response.statusText}`,
        imageUrl,
      );
    }

    return {
      bytes: Buffer.from(await response.arrayBuffer()),
      contentType: response.headers.get("content-type") ?? FALLBACK_CONTENT_TYPE,
    };
  } catch (err) {
    if (err instanceof ThumbnailDownloadError) throw err;
    throw new ThumbnailDownloadError(errorMessage(err), imageUrl);
  }
}

export async function resizeImage(bytes: Buffer): Promise<Buffer> {
  return sharp(bytes)
    .rotate()
    .resize({
      width: THUMBNAIL_MAX_EDGE_PX,
      height: THUMBNAIL_MAX_EDGE_PX,
      fit: "inside",
      withoutEnlargement: true,
      kernel: sharp.kernel.lanczos3,
    })
    .jpeg({ quality: 80, mozjpeg: true })
    .toBuffer();
}

/**
 * Downloads an image and shrinks it to fit a 1000px box as JPEG.
 * If the bytes cannot be decoded or re-encoded the original download is
 * returned untouched. A failed download throws {@link ThumbnailDownloadError}.
 */
export async function fetchAndResize(
  imageUrl: string,
  options: HttpOptions,
  logger: Logger,
): Promise<ImageAsset> {
  const original = await downloadImage(imageUrl, options);

  try {
    const resized = await resizeImage(original.bytes);
    logger.debug(
      { imageUrl, originalBytes: original.bytes.length, resizedBytes: resized.length },
      "thumbnail resized",
    );
    return { bytes: resized, contentType: "image/jpeg" };
  } catch (err) {
    logger.warn(
      { imageUrl, error: errorMessage(err) },
      "thumbnail resize failed, using original bytes",
    );
    return original;
  }
}

export async function loadThumbnail(
  imageUrl: string,
  options: HttpOptions,
  logger: Logger,
): Promise<ImageAsset | null> {
  try {
    return await fetchAndResize(imageUrl, options, logger);
  } catch (err) {
    logger.warn({ imageUrl, error: errorMessage(err) }, "thumbnail download failed");
    return null;
  }
}
