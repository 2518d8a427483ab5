export interface TaggedSpan {
  text: string;
  label: string;
  start: number;
  end: number;
  score?: number;
}

export interface ZeroShotScore {
  label: string;
  score: number;
}

export interface SentimentResult {
  label: string;
  score: number;
}

export type NlpCollaborator = 'analyze' | 'ner' | 'zero-shot' | 'sentiment';
