import type { StageEvent } from './types';

export interface SseStreamOptions {
  heartbeatMs: number;
  label?: string;
  onClose?: () => void;
  /** Socket and observer failures after the response has started. */
  onError?: (error: unknown, context: { label?: string; phase: string }) => void;
}

export interface SseStream {
  controller: AbortController;
  send: <T>(event: StageEvent<T>) => void;
  sendJson: (eventName: string, payload: unknown) => void;
  close: () => void;
}
