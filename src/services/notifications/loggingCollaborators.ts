import { componentLogger } from "../../utils/logger";
import {
  MarketplaceNotification,
  NotificationPublisher,
} from "../../interfaces/Notification";
import {
  EscalationGateway,
  ExecutionFailure,
  SettlementGateway,
  SettlementInstruction,
} from "../../interfaces/Collaborators";

const log = componentLogger("collaborators");

/**
 * Default publisher when no broker is configured
 */
export class LoggingNotificationPublisher implements NotificationPublisher {
  async publish(notification: MarketplaceNotification): Promise<void> {
    log.info(`notification ${notification.type}`, notification);
  }
}

export class LoggingSettlementGateway implements SettlementGateway {
  async matchCommitted(instruction: SettlementInstruction): Promise<void> {
    log.info(
      `settlement: match ${instruction.matchId} committed at price ${instruction.price}`,
      instruction
    );
  }
}

export class LoggingEscalationGateway implements EscalationGateway {
  async escalate(failure: ExecutionFailure): Promise<void> {
    log.warn(
      `escalation: match ${failure.matchId} failed (${failure.reason})`,
      failure
    );
  }
}
