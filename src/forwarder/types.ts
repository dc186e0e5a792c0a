import { Duplex } from 'stream';

export type AttemptOutcome = 'connected' | 'unavailable' | 'connect-failed' | 'not-found';

export interface StrategyAttempt {
  strategy: string;
  target?: string;
  outcome: AttemptOutcome;
  detail: string;
}

export interface StrategyResult {
  socket?: Duplex;
  attempts: StrategyAttempt[];
}

// One way of reaching the bridge listener on a device
export interface ConnectStrategy {
  readonly name: string;
  connect(deviceId: string, port: number, timeoutMs: number): Promise<StrategyResult>;
}

export type Connector = (host: string, port: number, timeoutMs: number) => Promise<Duplex>;

export function describeAttempt(attempt: StrategyAttempt): string {
  const label = attempt.target ? `${attempt.strategy}(${attempt.target})` : attempt.strategy;
  return `${label}: ${attempt.outcome}${attempt.detail ? ` (${attempt.detail})` : ''}`;
}
