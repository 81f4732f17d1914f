export const STREAM_KINDS = ["paper", "patent", "social", "news", "finance"] as const;

export type StreamKind = (typeof STREAM_KINDS)[number];

export function isStreamKind(value: string): value is StreamKind {
  return (STREAM_KINDS as readonly string[]).includes(value);
}

/** Human-facing nouns used in messages and rationale headers. */
export const STREAM_LABELS: { readonly [K in StreamKind]: { readonly noun: string; readonly title: string } } = {
  paper: { noun: "papers", title: "Publication" },
  patent: { noun: "patents", title: "Patent" },
  social: { noun: "social posts", title: "Social" },
  news: { noun: "news articles", title: "News" },
  finance: { noun: "price records", title: "Market" },
};
