import { CancellationStage } from "../enums/CancellationStage";

/**
 * Payment side: capture is triggered once per committed match
 */
export interface SettlementInstruction {
  matchId: string;
  shipmentId: string;
  driverId: string;
  price: number;
  committedAt: Date;
}

export interface SettlementGateway {
  matchCommitted(instruction: SettlementInstruction): Promise<void>;
}

/**
 * Ops side: irrecoverable execution failures that need a human
 */
export interface ExecutionFailure {
  matchId: string;
  shipmentId: string;
  driverId: string;
  stage: CancellationStage;
  reason: string;
  failedAt: Date;
}

export interface EscalationGateway {
  escalate(failure: ExecutionFailure): Promise<void>;
}

/**
 * Injected time source; tests pass a fixed clock
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
