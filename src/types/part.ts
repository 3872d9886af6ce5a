/** Part containing plain text. */
export interface TextPart {
  kind: 'text';
  text: string;
  metadata?: Record<string, unknown>;
}

/** Part containing structured JSON data. */
export interface DataPart {
  kind: 'data';
  data: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

/** Content unit within messages and artifacts, tagged by `kind`. */
export type Part = TextPart | DataPart;

export type PartKind = Part['kind'];
