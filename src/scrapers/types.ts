export type SignalSource = 'github' | 'onchain' | 'research';

export type SignalStrength = 'high' | 'medium' | 'low';

export interface SignalMetadata {
  category?: string; // narrative id hint from research or on-chain data
  topics?: string[]; // GitHub topic tags
  stars?: number;
  forks?: number;
  language?: string;
  created_at?: string;
  evidence?: string[];
  why_emerging?: string;
  signal_strength?: SignalStrength;
  program_id?: string;
  metrics?: Record<string, number>;
  fallback?: boolean; // static placeholder, no live observation behind it
}

export interface Signal {
  source: SignalSource;
  source_id: string;
  title: string;
  description: string;
  url: string;
  published_at: string; // ISO 8601
  metadata: SignalMetadata;
}

export interface ScraperResult {
  source: SignalSource;
  signals: Signal[];
  errors: string[];
}
