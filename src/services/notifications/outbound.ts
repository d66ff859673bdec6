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

const log = componentLogger("outbound");

/**
 * Fire-and-forget fan-out to the external collaborators. Callers invoke
 * these only after their transaction committed; a collaborator failure is
 * logged and never reaches the business operation.
 */
export class OutboundChannel {
  constructor(
    private readonly publisher: NotificationPublisher,
    private readonly settlement: SettlementGateway,
    private readonly escalation: EscalationGateway
  ) {}

  notify(notification: MarketplaceNotification): void {
    this.publisher.publish(notification).catch((error: unknown) => {
      log.warn(`Failed to publish ${notification.type}`, {
        shipmentId: notification.shipmentId,
        error: describe(error),
      });
    });
  }

  settle(instruction: SettlementInstruction): void {
    this.settlement.matchCommitted(instruction).catch((error: unknown) => {
      log.warn(`Settlement trigger failed for match ${instruction.matchId}`, {
        error: describe(error),
      });
    });
  }

  escalate(failure: ExecutionFailure): void {
    this.escalation.escalate(failure).catch((error: unknown) => {
      log.warn(`Escalation failed for match ${failure.matchId}`, {
        error: describe(error),
      });
    });
  }

  async close(): Promise<void> {
    if (this.publisher.close) {
      await this.publisher.close();
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
