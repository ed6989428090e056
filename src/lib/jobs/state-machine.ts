import type { DocumentStatus } from '@/types/document';
import type { JobState, TerminalJobState } from '@/types/pipeline';

const ORDER: Record<JobState, number> = {
  queued: 0,
  extracting: 1,
  ocr: 2,
  harvesting_metadata: 3,
  reconciling: 4,
  segmenting: 5,
  embedding: 6,
  complete: 7,
  failed: 8,
};

export function isTerminal(state: JobState): state is TerminalJobState {
  return state === 'complete' || state === 'failed';
}

/**
 * Forward moves only; optional stages (ocr) may be skipped. `failed` is
 * reached through `canFail`, never by advancing.
 */
export function canAdvance(from: JobState, to: JobState): boolean {
  if (isTerminal(from) || to === 'failed') return false;
  return ORDER[to] > ORDER[from];
}

export function canFail(from: JobState): boolean {
  return !isTerminal(from);
}

export function toDocumentStatus(state: JobState): DocumentStatus {
  switch (state) {
    case 'queued':
      return 'pending';
    case 'complete':
      return 'complete';
    case 'failed':
      return 'failed';
    default:
      return 'processing';
  }
}
