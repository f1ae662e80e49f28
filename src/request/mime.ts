/**
 * Best-effort content type inference from an object name.
 */

const SUFFIX_ALIASES: Record<string, string> = {
  ".tgz": ".tar.gz",
  ".taz": ".tar.gz",
  ".tbz2": ".tar.bz2",
  ".txz": ".tar.xz",
};

const ENCODINGS: Record<string, string> = {
  ".gz": "gzip",
  ".z": "compress",
  ".bz2": "bzip2",
  ".xz": "xz",
  ".br": "br",
};

const CONTENT_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".text": "text/plain",
  ".log": "text/plain",
  ".csv": "text/csv",
  ".htm": "text/html",
  ".html": "text/html",
  ".css": "text/css",
  ".md": "text/markdown",
  ".xml": "text/xml",
  ".js": "text/javascript",
  ".mjs": "text/javascript",
  ".json": "application/json",
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".tar": "application/x-tar",
  ".doc": "application/msword",
  ".xls": "application/vnd.ms-excel",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
  ".ico": "image/vnd.microsoft.icon",
  ".mp3": "audio/mpeg",
  ".wav": "audio/x-wav",
  ".mp4": "video/mp4",
  ".webm": "video/webm",
};

export interface GuessedType {
  contentType?: string;
  contentEncoding?: string;
}

function extensionOf(name: string): string | undefined {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot).toLowerCase() : undefined;
}

/**
 * Guess content type and encoding from the trailing extensions of a name:
 * `notes.txt` is `text/plain`, `notes.txt.gz` is `text/plain` with `gzip`
 * encoding. Unknown extensions leave both fields unset.
 */
export function guessContentType(objectName: string): GuessedType {
  let base = objectName.slice(objectName.lastIndexOf("/") + 1);

  let ext = extensionOf(base);
  const alias = ext === undefined ? undefined : SUFFIX_ALIASES[ext];
  if (ext !== undefined && alias !== undefined) {
    base = base.slice(0, -ext.length) + alias;
    ext = extensionOf(base);
  }

  let contentEncoding: string | undefined;
  if (ext !== undefined && ENCODINGS[ext] !== undefined) {
    contentEncoding = ENCODINGS[ext];
    base = base.slice(0, -ext.length);
    ext = extensionOf(base);
  }

  const contentType = ext === undefined ? undefined : CONTENT_TYPES[ext];
  return { contentType, contentEncoding };
}
