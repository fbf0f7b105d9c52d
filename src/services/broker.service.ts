import { EventEmitter } from "events";
import logger from "../utils/logger";
import type { ProgressEvent, ProgressEventPayload } from "../models/event.model";

export type ProgressListener = (event: ProgressEvent) => void;

const CHANNEL = "progress";

/**
 * In-process event channel for one session. Every progress, log and summary
 * notification goes through `publishEvent` as a typed `ProgressEvent`.
 */
export class BrokerService {
  private emitter = new EventEmitter();
  private published = 0;

  constructor(readonly sessionId: string) {
    this.emitter.setMaxListeners(0);
  }

  get publishedCount(): number {
    return this.published;
  }

  publishEvent(payload: ProgressEventPayload): void {
    const event: ProgressEvent = {
      ...payload,
      sessionId: this.sessionId,
      timestamp: new Date().toISOString(),
    };
    this.published += 1;
    this.emitter.emit(CHANNEL, event);
  }

  log(level: "info" | "warn" | "error", message: string): void {
    logger.log(level, message, { sessionId: this.sessionId });
    this.publishEvent({ kind: "log", level, message });
  }

  subscribeToEvents(callback: ProgressListener): () => void {
    const handler = (event: ProgressEvent) => {
      try {
        callback(event);
      } catch (error) {
        logger.error("Error in progress listener:", error);
      }
    };
    this.emitter.on(CHANNEL, handler);
    logger.debug(`Subscribed to ${CHANNEL} events`, {
      sessionId: this.sessionId,
    });
    return () => {
      this.emitter.off(CHANNEL, handler);
    };
  }

  disconnect(): void {
    this.emitter.removeAllListeners(CHANNEL);
  }
}
