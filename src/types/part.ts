/** Media type string (e.g. "text/plain", "application/json"). */
export type MediaType = string;

/** Part containing plain text or code content. */
export interface TextPart {
  kind: 'text';
  text: string;
  mediaType?: MediaType;
}

/** Part containing base64-encoded binary content. */
export interface RawPart {
  kind: 'raw';
  raw: string;
  mediaType: MediaType;
}

/** Part referencing external content via URL. */
export interface UrlPart {
  kind: 'url';
  url: string;
  mediaType?: MediaType;
}

/** Part containing structured JSON data. */
export interface DataPart {
  kind: 'data';
  data: Record<string, unknown>;
  mediaType?: MediaType;
}

/** Content unit within messages and artifacts. */
export type Part = TextPart | RawPart | UrlPart | DataPart;
