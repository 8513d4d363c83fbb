// Progress events published by the intel pipeline

export type PipelineStage =
  | 'starting'
  | 'analyzing'
  | 'scraping'
  | 'translating'
  | 'classifying'
  | 'ranking'
  | 'completed'
  | 'error';

export interface ProgressEvent {
  sessionId: string;
  stage: PipelineStage;
  status: string;
  progressPercent: number;
  timestamp: Date;
}

// What socket clients receive
export interface ProgressPayload {
  session_id: string;
  stage: PipelineStage;
  status: string;
  progress_percent: number;
  timestamp: string;
}
