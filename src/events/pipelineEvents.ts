import type { EngineProgress, ExtractionEntry, Phase } from '../core/types.js';

export interface PipelineEvents {
  [k: string]: unknown;
  phaseChanged: { sessionId: string; from: Phase; to: Phase; at: string };
  itemExtracted: { sessionId: string; identity: string; status: ExtractionEntry['status'] };
  progress: { sessionId: string; progress: EngineProgress };
  itemCracked: { sessionId: string; identity: string; elapsedMs: number };
}
