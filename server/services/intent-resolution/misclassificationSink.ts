import { FallbackLevel, type MisclassificationData } from "../../../shared/schemas/intent";
import { createLogger, type Logger } from "../../utils/logger";

export interface MisclassificationSink {
  record(data: MisclassificationData): Promise<void>;
}

/** Writes each record to the structured log. */
export class LoggingMisclassificationSink implements MisclassificationSink {
  constructor(private readonly log: Logger = createLogger("misclassification")) {}

  async record(data: MisclassificationData): Promise<void> {
    this.log.info("Recorded misclassification", {
      misclassificationId: data.id,
      query: data.originalQuery,
      actualIntent: data.actualIntent,
      expectedIntent: data.expectedIntent ?? null,
      confidence: data.confidence,
      fallbackApplied: FallbackLevel[data.fallbackApplied],
      fallbackSuccessful: data.fallbackSuccessful,
      details: data.additionalDetails,
    });
  }
}
