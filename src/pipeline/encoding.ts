// pattern: functional-core

const DECLARED_ENCODING = /<\?xml[^>]*\bencoding=["']([^"']+)["']/i;
const META_CHARSET = /<meta[^>]+charset=["']?([\w:.-]+)/i;

/**
 * Reads the `charset` parameter of a Content-Type header value.
 */
export function charsetFromContentType(contentType: string | null): string | null {
  const match = contentType?.match(/charset=["']?([^\s;"']+)/i);
  return match?.[1] ?? null;
}

function decodeAs(bytes: Uint8Array, label: string | null): string {
  if (label) {
    try {
      return new TextDecoder(label).decode(bytes);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      // unknown label, decode as utf-8
    }
  }
  return new TextDecoder("utf-8").decode(bytes);
}

// Byte-for-byte view of the leading bytes, enough to find a declaration.
function sniffHead(bytes: Uint8Array, length: number): string {
  return new TextDecoder("latin1").decode(bytes.subarray(0, length));
}

/**
 * Decodes a feed document. The XML declaration's encoding wins over the
 * Content-Type charset; an unknown or missing label falls back to UTF-8.
 */
export function decodeFeedBody(bytes: Uint8Array, contentType: string | null): string {
  const declared = sniffHead(bytes, 200).match(DECLARED_ENCODING)?.[1] ?? null;
  return decodeAs(bytes, declared ?? charsetFromContentType(contentType));
}

/**
 * Decodes an HTML page using the Content-Type charset, then a `<meta>`
 * charset declaration in the first 2 KiB, then UTF-8.
 */
export function decodeHtmlBody(bytes: Uint8Array, contentType: string | null): string {
  const meta = sniffHead(bytes, 2048).match(META_CHARSET)?.[1] ?? null;
  return decodeAs(bytes, charsetFromContentType(contentType) ?? meta);
}
